/**
 * Error handling for the ideasmith pipeline.
 *
 * Per-artifact problems (unsafe paths, failed writes) are never thrown; they
 * are recorded in the materializer's WriteReport. PipelineError is reserved
 * for whole-stage and programmer errors.
 */

export type PipelineErrorCode =
  | 'DECODE_EMPTY'
  | 'PRECONDITION_FAILED'
  | 'TRANSPORT_ERROR'
  | 'UNKNOWN_GRAMMAR'
  | 'UNKNOWN_STAGE'
  | 'MISSING_INPUT'
  | 'STAGE_FAILED'
  | 'CONFIG_INVALID'
  | 'INVALID_IDEA_LIST';

const RECOVERABLE_CODES: ReadonlySet<PipelineErrorCode> = new Set<PipelineErrorCode>([
  'DECODE_EMPTY',
  'TRANSPORT_ERROR',
]);

/**
 * Base error for everything the pipeline raises on purpose.
 *
 * @example
 * ```typescript
 * try {
 *   await runner.run('generate-code', { projectRoot });
 * } catch (error) {
 *   if (PipelineError.isPipelineError(error) && error.isRecoverable) {
 *     // ask the model again
 *   }
 * }
 * ```
 */
export class PipelineError extends Error {
  /** Error code for programmatic handling */
  readonly code: PipelineErrorCode;

  /** Whether retrying the generation call can help */
  readonly isRecoverable: boolean;

  constructor(
    message: string,
    code: PipelineErrorCode,
    options: { cause?: unknown; isRecoverable?: boolean } = {}
  ) {
    super(message, { cause: options.cause });

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = 'PipelineError';
    this.code = code;
    this.isRecoverable = options.isRecoverable ?? RECOVERABLE_CODES.has(code);
  }

  /**
   * Type guard to check if an error is a PipelineError.
   */
  static isPipelineError(error: unknown): error is PipelineError {
    return error instanceof PipelineError;
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check a Node errno code (`ENOENT`, `EACCES`, ...) on an unknown error.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Describe an OS-level failure, keeping the errno code when there is one
 * (e.g. `EACCES: permission denied, open '...'`).
 */
export function describeFsError(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (code && !error.message.startsWith(code)) {
      return `${code}: ${error.message}`;
    }
    return error.message;
  }
  return String(error);
}
