/**
 * Error type for controller failures that end a run before or outside the loop.
 */

import { ERROR_CODE_EXIT_MAP, type ControllerErrorCodeType } from '../../lib/controller/types.js';

export class ControllerError extends Error {
  constructor(
    message: string,
    readonly code: ControllerErrorCodeType,
    readonly exitCode: number = ERROR_CODE_EXIT_MAP[code],
  ) {
    super(message);
    this.name = 'ControllerError';
  }
}

/** Build a ControllerError with the exit code registered for its code. */
export function controllerError(code: ControllerErrorCodeType, message: string): ControllerError {
  return new ControllerError(message, code, ERROR_CODE_EXIT_MAP[code]);
}

/** Error codes that count as a fatal precondition of the run. */
export function isFatalPrecondition(code: ControllerErrorCodeType): boolean {
  return (
    code === 'E_INTEGRITY_CORRUPT' ||
    code === 'E_PRECONDITION_MISSING' ||
    code === 'E_CONFIG_INVALID' ||
    code === 'E_RUN_LOCKED'
  );
}
