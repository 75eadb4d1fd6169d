/**
 * Controller configuration schema and loader.
 *
 * Every field has a default, so no config file is required.
 * Projects can create .closer.yml to customize; CLOSER_* environment
 * variables and CLI flags override the file.
 */

import { z } from 'zod';

// =============================================================================
// Duration Parsing
// =============================================================================

const DURATION_RE = /^(\d+)(ms|s|m|h)$/;

/** Parse a human-readable duration string into milliseconds. */
export function parseDuration(input: string): number {
  const match = DURATION_RE.exec(input);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid duration: "${input}" (expected format: 15m, 30s, 1h, 500ms)`);
  }
  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case 'ms':
      return value;
    case 's':
      return value * 1000;
    case 'm':
      return value * 60 * 1000;
    case 'h':
      return value * 60 * 60 * 1000;
    default:
      throw new Error(`Unknown duration unit: ${match[2]}`);
  }
}

// =============================================================================
// Config Schema
// =============================================================================

export const AgentBackendName = z.enum(['codex', 'claude-code', 'subprocess']);
export type AgentBackendNameType = z.infer<typeof AgentBackendName>;

export const ControllerConfigSchema = z.object({
  spec: z.string().default('PRD/product_prd.md'),
  agent_rules: z.string().default('AGENTS.md'),

  agent: z
    .object({
      backend: AgentBackendName.default('codex'),
      command: z.string().nullable().default(null),
      sandbox: z.string().nullable().default(null),
      timeout: z.string().default('none'),
    })
    .default({}),

  audit: z
    .object({
      path: z.string().default('tools/prd_audit.py'),
      interpreter: z.string().nullable().default('python3'),
      format: z.enum(['auto', 'json', 'sections']).default('auto'),
    })
    .default({}),

  test: z
    .object({
      command: z.string().default('pytest'),
      args: z.array(z.string()).default([]),
    })
    .default({}),

  scope: z.array(z.string().min(1)).min(1).default(['src', 'tests']),

  loop: z
    .object({
      max_loops: z.number().int().min(1).default(5),
      sentinel: z.string().min(1).default('NO_CHANGES_NEEDED'),
    })
    .default({}),

  git: z
    .object({
      branch: z.boolean().default(false),
    })
    .default({}),
});

export type ControllerConfig = z.infer<typeof ControllerConfigSchema>;

/** Load and validate a raw config object, applying all defaults. */
export function parseControllerConfig(raw: unknown): ControllerConfig {
  return ControllerConfigSchema.parse(raw ?? {});
}

/** Agent call limit in milliseconds; undefined when unbounded. */
export function getAgentTimeoutMs(config: ControllerConfig): number | undefined {
  return config.agent.timeout === 'none' ? undefined : parseDuration(config.agent.timeout);
}

// =============================================================================
// Overrides
// =============================================================================

export interface ConfigOverrides {
  agentCommand?: string;
  sandbox?: string;
  maxLoops?: string;
  backend?: string;
}

/** Read CLOSER_AGENT, CLOSER_SANDBOX and CLOSER_MAX_LOOPS from an environment. */
export function overridesFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env.CLOSER_AGENT) overrides.agentCommand = env.CLOSER_AGENT;
  if (env.CLOSER_SANDBOX) overrides.sandbox = env.CLOSER_SANDBOX;
  if (env.CLOSER_MAX_LOOPS) overrides.maxLoops = env.CLOSER_MAX_LOOPS;
  return overrides;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/**
 * Merge overrides into a raw (unvalidated) config object.
 * Later entries in `layers` win.
 */
export function applyOverrides(rawConfig: unknown, ...layers: ConfigOverrides[]): unknown {
  const merged = asRecord(rawConfig);
  const agent = asRecord(merged.agent);
  const loop = asRecord(merged.loop);

  for (const layer of layers) {
    if (layer.agentCommand !== undefined) agent.command = layer.agentCommand;
    if (layer.sandbox !== undefined) agent.sandbox = layer.sandbox;
    if (layer.backend !== undefined) agent.backend = layer.backend;
    if (layer.maxLoops !== undefined) {
      const n = Number(layer.maxLoops);
      if (!Number.isInteger(n) || n < 1) {
        throw new Error(`Invalid max loops value: ${layer.maxLoops}`);
      }
      loop.max_loops = n;
    }
  }

  merged.agent = agent;
  merged.loop = loop;
  return merged;
}
