/**
 * Library entry: the loop controller, its collaborator interfaces and the
 * pure helpers, so callers can inject their own agent, audit or test source.
 */

export { LoopController } from './cli/lib/controller/loop-controller.js';
export type {
  ControllerDeps,
  LoopControllerOptions,
  PreviewResult,
} from './cli/lib/controller/loop-controller.js';

export type {
  AgentBackend,
  AgentResult,
  AuditReport,
  AuditSource,
  ChangeSource,
  ClassificationType,
  ControllerErrorCodeType,
  LoopState,
  ModeType,
  PromptPayload,
  RequirementStatus,
  RunLog,
  SpawnOptions,
  TerminationResult,
  TerminationStatusType,
  TestGateResult,
  TestSource,
} from './lib/controller/types.js';
export { ERROR_CODE_EXIT_MAP, exitCodeFor } from './lib/controller/types.js';

export {
  ControllerConfigSchema,
  applyOverrides,
  getAgentTimeoutMs,
  overridesFromEnv,
  parseControllerConfig,
  parseDuration,
} from './lib/controller/config.js';
export type { ConfigOverrides, ControllerConfig } from './lib/controller/config.js';

export {
  coveredIds,
  missingIds,
  openIds,
  parseAuditOutput,
  partialIds,
} from './lib/controller/audit-parser.js';
export type { AuditFormat } from './lib/controller/audit-parser.js';
export { containsSentinel, selectMode } from './lib/controller/mode.js';
export { buildAgentPrompt, buildRequirementSummary } from './cli/lib/controller/prompts.js';
export type { PromptContext } from './cli/lib/controller/prompts.js';

export { AuditRunner } from './cli/lib/controller/audit-runner.js';
export { ChangeDetector } from './cli/lib/controller/change-detector.js';
export { TestGate } from './cli/lib/controller/test-gate.js';
export { verifyIntegrity, CORRUPTION_MARKER } from './cli/lib/controller/integrity-guard.js';
export { checkPreconditions, requiredResources } from './cli/lib/controller/preconditions.js';

export { ClaudeCodeBackend } from './cli/lib/controller/backends/claude-code.js';
export { CodexBackend } from './cli/lib/controller/backends/codex.js';
export { SubprocessBackend } from './cli/lib/controller/backends/subprocess.js';
export { createAgentBackend } from './cli/lib/controller/backends/detect.js';

export { ControllerError, controllerError } from './cli/lib/errors.js';
