/**
 * Types for the IAM user creation notification flow
 */

export interface PrincipalTag {
  key: string;
  value: string;
}

/**
 * Principal record as read from IAM
 */
export interface PrincipalRecord {
  userName: string;
  arn?: string;
  tags: PrincipalTag[];
}

export type UserCreationStatusCode = 200 | 500;

/**
 * Structured result returned by every invocation; the handler never throws
 */
export interface UserCreationResult {
  statusCode: UserCreationStatusCode;
  body: string;
}

export type NotificationOutcome =
  | { kind: 'PROCESSED'; userName: string; email?: string }
  | { kind: 'SKIPPED'; reason: string }
  | { kind: 'FAILED'; userName: string; errorClass: string; errorCode: string; message: string };

/**
 * Identity-record store
 */
export interface IPrincipalDirectory {
  getPrincipal(userName: string): Promise<PrincipalRecord>;
}

/**
 * Parameter store holding per-user email addresses
 */
export interface IEmailParameterStore {
  getEmail(userName: string): Promise<string | undefined>;
}

/**
 * Secret store holding the shared temporary password
 */
export interface ITemporaryPasswordStore {
  getTemporaryPassword(): Promise<string>;
}
