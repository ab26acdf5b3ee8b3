/**
 * Error types and helpers for the log streaming pipeline
 */

/**
 * Raised when no container in the cluster runs the requested image
 */
export class ImageNotFoundError extends Error {
  constructor(public readonly image: string) {
    super(`image ${image} not found`);
    this.name = 'ImageNotFoundError';
  }
}

/**
 * Prefixes an error message with the operation that failed, keeping the original as `cause`
 *
 * @example
 * wrapError('getting pods', new Error('connection refused'))
 * // Error: getting pods: connection refused
 */
export function wrapError(context: string, error: unknown): Error {
  const message = error instanceof Error ? error.message : String(error);
  return new Error(`${context}: ${message}`, { cause: error });
}

/**
 * True for the rejection produced by an aborted AbortSignal
 */
export function isAbortError(error: unknown): boolean {
  // DOMException and Node's internal AbortError may come from another realm
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

/**
 * Raised when the output sink rejects a write
 */
export class OutputWriteError extends Error {
  constructor(cause: unknown) {
    super(`writing to out: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'OutputWriteError';
  }
}
