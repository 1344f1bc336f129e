export type TrackerErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'DUPLICATE'
  | 'TIMER_RUNNING'
  | 'TIMER_NOT_RUNNING'
  | 'AUTH';

/**
 * Recoverable failure caused by user input or an invalid timer operation.
 * Commands report the message and keep the stored data untouched.
 */
export class TrackerError extends Error {
  constructor(
    message: string,
    public readonly code: TrackerErrorCode
  ) {
    super(message);
    this.name = 'TrackerError';
  }
}

export function isTrackerError(error: unknown): error is TrackerError {
  return error instanceof TrackerError;
}
