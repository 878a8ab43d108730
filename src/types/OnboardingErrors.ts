/**
 * Onboarding Errors - typed failures for the user creation notification flow
 *
 * Each error carries an error_class and error_code so the handler boundary can
 * map it to a structured result without inspecting messages.
 */

export type OnboardingErrorClass = 'VALIDATION' | 'NOT_FOUND' | 'ACCESS' | 'UNKNOWN';

/**
 * Base onboarding error
 */
export class OnboardingError extends Error {
  constructor(
    message: string,
    public readonly error_class: OnboardingErrorClass,
    public readonly error_code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Event carried no principal name. Handled locally as a no-op.
 */
export class MissingInputError extends OnboardingError {
  constructor(path: string) {
    super(`No username found in the event (expected at ${path})`, 'VALIDATION', 'MISSING_USER_NAME');
  }
}

/**
 * Principal record could not be read from the identity store
 */
export class LookupError extends OnboardingError {
  constructor(userName: string, cause?: unknown) {
    const notFound = errorName(cause) === 'NoSuchEntityException' || errorName(cause) === 'NoSuchEntity';
    super(
      `Could not look up user ${userName}: ${describeError(cause)}`,
      notFound ? 'NOT_FOUND' : 'ACCESS',
      notFound ? 'USER_NOT_FOUND' : 'USER_LOOKUP_FAILED',
      cause
    );
  }
}

/**
 * Email parameter unreadable. Non-fatal: logged and processing continues.
 */
export class EmailLookupWarning extends OnboardingError {
  constructor(parameterName: string, cause?: unknown) {
    super(
      `Could not retrieve email from Parameter Store (${parameterName}): ${describeError(cause)}`,
      errorName(cause) === 'ParameterNotFound' ? 'NOT_FOUND' : 'ACCESS',
      'EMAIL_PARAMETER_UNAVAILABLE',
      cause
    );
  }
}

/**
 * Shared temporary password secret missing or inaccessible
 */
export class SecretAccessError extends OnboardingError {
  constructor(secretId: string, cause?: unknown) {
    super(
      `Could not read secret ${secretId}: ${describeError(cause)}`,
      errorName(cause) === 'ResourceNotFoundException' ? 'NOT_FOUND' : 'ACCESS',
      'SECRET_UNAVAILABLE',
      cause
    );
  }
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

/** Message of an Error, or the value itself when something else was thrown. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
