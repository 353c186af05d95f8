export type ResolutionErrorCode =
  | 'UnknownComponent'
  | 'UnknownIngredient'
  | 'DuplicateName'
  | 'InvalidComponent'
  | 'InvalidRate'
  | 'DepthLimitExceeded';

/**
 * Raised by catalog registration and engine queries.
 * `subject` names the component (or speed category) the failure is about.
 */
export class ResolutionError extends Error {
  readonly code: ResolutionErrorCode;
  readonly subject: string | null;

  constructor(code: ResolutionErrorCode, message: string, subject: string | null = null) {
    super(message);
    this.name = 'ResolutionError';
    this.code = code;
    this.subject = subject;
  }
}

export function isResolutionError(err: unknown, code?: ResolutionErrorCode): err is ResolutionError {
  return err instanceof ResolutionError && (code === undefined || err.code === code);
}
