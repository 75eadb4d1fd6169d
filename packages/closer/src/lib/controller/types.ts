/**
 * Zod schemas and TypeScript types for the convergence controller.
 *
 * Pure types with no CLI or Node dependencies.
 */

import { z } from 'zod';

// =============================================================================
// Requirement Classification
// =============================================================================

export const Classification = z.enum(['missing', 'partial', 'covered']);
export type ClassificationType = z.infer<typeof Classification>;

export const RequirementStatusSchema = z.object({
  id: z.string().min(1),
  classification: Classification,
});
export type RequirementStatus = z.infer<typeof RequirementStatusSchema>;

/**
 * One audit pass, normalized.
 *
 * `requirements` is in audit-emission order and holds each identifier once.
 * `raw` is the audit tool's combined output, verbatim.
 */
export interface AuditReport {
  requirements: RequirementStatus[];
  raw: string;
  exitCode: number;
  /** False when the output matched no recognized format. */
  parsed: boolean;
}

// =============================================================================
// Mode
// =============================================================================

export const Mode = z.enum(['implement', 'verify']);
export type ModeType = z.infer<typeof Mode>;

// =============================================================================
// Loop State
// =============================================================================

export interface LoopState {
  iteration: number;
  mode: ModeType;
  consecutiveNoChangeCount: number;
}

// =============================================================================
// Prompt Payload
// =============================================================================

export interface PromptPayload {
  mode: ModeType;
  requirementSummary: string;
  loopMarker: string;
  text: string;
}

// =============================================================================
// Termination
// =============================================================================

export const TerminationStatus = z.enum([
  'converged',
  'max_loops_exceeded',
  'fatal_precondition',
]);
export type TerminationStatusType = z.infer<typeof TerminationStatus>;

export interface TerminationResult {
  status: TerminationStatusType;
  runId: string;
  iterations: number;
  message?: string;
  /** Error code behind a fatal precondition. */
  code?: ControllerErrorCodeType;
  finalReport?: AuditReport;
}

// =============================================================================
// Error Codes
// =============================================================================

export const ControllerErrorCode = z.enum([
  'E_INTEGRITY_CORRUPT',
  'E_PRECONDITION_MISSING',
  'E_CONFIG_INVALID',
  'E_RUN_LOCKED',
  'E_MAX_LOOPS',
  'E_INTERRUPTED',
]);
export type ControllerErrorCodeType = z.infer<typeof ControllerErrorCode>;

/** Maps error codes to CLI exit codes */
export const ERROR_CODE_EXIT_MAP: Record<ControllerErrorCodeType, number> = {
  E_INTEGRITY_CORRUPT: 2,
  E_PRECONDITION_MISSING: 2,
  E_CONFIG_INVALID: 2,
  E_RUN_LOCKED: 3,
  E_MAX_LOOPS: 5,
  E_INTERRUPTED: 130,
};

/** Process exit status for each way a run can end. */
export function exitCodeFor(result: TerminationResult): number {
  switch (result.status) {
    case 'converged':
      return 0;
    case 'max_loops_exceeded':
      return ERROR_CODE_EXIT_MAP.E_MAX_LOOPS;
    case 'fatal_precondition':
      return ERROR_CODE_EXIT_MAP[result.code ?? 'E_PRECONDITION_MISSING'];
  }
}

// =============================================================================
// Subprocess Results
// =============================================================================

export const AgentResultSchema = z.object({
  status: z.enum(['success', 'failure', 'timeout', 'aborted']),
  exitCode: z.number().int(),
  output: z.string(),
  duration: z.number(),
});
export type AgentResult = z.infer<typeof AgentResultSchema>;

export interface TestGateResult {
  passed: boolean;
  exitCode: number;
  output: string;
  duration: number;
}

// =============================================================================
// Controller Event
// =============================================================================

const eventBase = {
  v: z.literal(1),
  ts: z.string().datetime(),
};

const iterationEvent = {
  ...eventBase,
  iteration: z.number().int(),
};

const attemptEvent = {
  ...iterationEvent,
  loop_marker: z.string(),
};

/** One line of `events.jsonl`, keyed by `event`. */
export const ControllerEventSchema = z.discriminatedUnion('event', [
  z.object({
    ...eventBase,
    event: z.literal('run_started'),
    run_id: z.string(),
    max_loops: z.number().int(),
  }),
  z.object({ ...eventBase, event: z.literal('branch_created'), branch: z.string().nullable() }),
  z.object({
    ...iterationEvent,
    event: z.literal('audit_finished'),
    exit_code: z.number().int(),
    parsed: z.boolean(),
    missing: z.array(z.string()),
    partial: z.array(z.string()),
    covered: z.number().int(),
  }),
  z.object({ ...iterationEvent, event: z.literal('mode_selected'), mode: Mode }),
  z.object({
    ...eventBase,
    event: z.literal('agent_started'),
    loop_marker: z.string(),
    mode: Mode,
  }),
  z.object({
    ...eventBase,
    event: z.literal('agent_finished'),
    loop_marker: z.string(),
    status: AgentResultSchema.shape.status,
    exit_code: z.number().int(),
    duration_ms: z.number(),
  }),
  z.object({ ...attemptEvent, event: z.literal('sentinel_seen') }),
  z.object({
    ...attemptEvent,
    event: z.literal('tests_finished'),
    passed: z.boolean(),
    exit_code: z.number().int(),
  }),
  z.object({ ...attemptEvent, event: z.literal('stall_detected') }),
  z.object({ ...attemptEvent, event: z.literal('stall_retry') }),
  z.object({
    ...iterationEvent,
    event: z.literal('final_tests_finished'),
    passed: z.boolean(),
    exit_code: z.number().int(),
  }),
  z.object({
    ...eventBase,
    event: z.literal('run_completed'),
    status: z.enum(['converged', 'max_loops_exceeded']),
    iterations: z.number().int(),
    missing: z.array(z.string()).optional(),
    partial: z.array(z.string()).optional(),
  }),
  z.object({ ...eventBase, event: z.literal('run_interrupted') }),
]);
export type ControllerEvent = z.infer<typeof ControllerEventSchema>;

/** An event as emitted; the logger stamps `v` and `ts`. */
export type ControllerEventInput = ControllerEvent extends infer E
  ? E extends ControllerEvent
    ? Omit<E, 'v' | 'ts'>
    : never
  : never;

// =============================================================================
// Run Log Schema
// =============================================================================

export const RunLogIterationSchema = z.object({
  iteration: z.number().int(),
  startedAt: z.string().datetime(),
  mode: Mode,
  auditExitCode: z.number().int(),
  missing: z.array(z.string()),
  partial: z.array(z.string()),
  covered: z.array(z.string()),
  agentInvocations: z.number().int(),
  changed: z.boolean().optional(),
  retried: z.boolean(),
  testsPassed: z.boolean().optional(),
  sentinel: z.boolean(),
});
export type RunLogIteration = z.infer<typeof RunLogIterationSchema>;

export const RunLogSchema = z.object({
  runId: z.string(),
  spec: z.string(),
  startedAt: z.string().datetime(),
  status: z.enum(['in_progress', 'converged', 'max_loops_exceeded', 'fatal_precondition']),
  maxLoops: z.number().int(),
  iterations: z.array(RunLogIterationSchema).default([]),
  completedAt: z.string().datetime().optional(),
  totalDuration: z.string().optional(),
  totalAgentInvocations: z.number().int().optional(),
  message: z.string().optional(),
});
export type RunLog = z.infer<typeof RunLogSchema>;

// =============================================================================
// Collaborator Interfaces
// =============================================================================

export interface SpawnOptions {
  workdir: string;
  prompt: string;
  /** Milliseconds; undefined means no limit. */
  timeout?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
}

/** An opaque code-generation agent: text in, text out, may edit any file. */
export interface AgentBackend {
  name: string;
  /** Executable the backend runs; checked on PATH before the loop starts. */
  executable: string;
  spawn(opts: SpawnOptions): Promise<AgentResult>;
}

export interface AuditSource {
  run(signal?: AbortSignal): Promise<AuditReport>;
}

export interface ChangeSource {
  checkpoint(): Promise<void>;
  hasInScopeChange(): Promise<boolean>;
}

export interface TestSource {
  run(signal?: AbortSignal): Promise<TestGateResult>;
}
