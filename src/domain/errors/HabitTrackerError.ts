export type HabitTrackerErrorCode =
  | 'InvalidInput'
  | 'DuplicateUsername'
  | 'InvalidCredentials'
  | 'NotFoundOrForbidden'
  | 'InvalidDate'
  | 'InvalidConfiguration';

/**
 * Expected failure of a use case. The message is safe to show to the user;
 * the web layer turns it into a redirect plus a notice.
 */
export class HabitTrackerError extends Error {
  readonly code: HabitTrackerErrorCode;

  constructor(code: HabitTrackerErrorCode, message: string) {
    super(message);
    this.name = 'HabitTrackerError';
    this.code = code;
  }
}

export function isHabitTrackerError(error: unknown, code?: HabitTrackerErrorCode): error is HabitTrackerError {
  return error instanceof HabitTrackerError && (code === undefined || error.code === code);
}
