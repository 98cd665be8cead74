import type { Location } from '../utils/index';

export type RuntimeErrorCode =
  | 'TYPE_MISMATCH'
  | 'DIVISION_BY_ZERO'
  | 'INVALID_INTEGER'
  | 'NOT_IMPLEMENTED'
  | 'UNSUPPORTED_STATEMENT';

/**
 * Fatal evaluation failure. Raised at the offending node and never
 * caught inside the evaluator, so the rest of the program does not run.
 */
export class SproutRuntimeError extends Error {
  readonly code: RuntimeErrorCode;
  readonly location?: Location;

  constructor(code: RuntimeErrorCode, message: string, location?: Location) {
    super(message);
    this.name = 'SproutRuntimeError';
    this.code = code;
    this.location = location;
  }
}

export function isSproutRuntimeError(error: unknown): error is SproutRuntimeError {
  return error instanceof SproutRuntimeError;
}
