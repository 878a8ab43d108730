import {
  IEmailParameterStore,
  IPrincipalDirectory,
  ITemporaryPasswordStore,
  NotificationOutcome,
  UserCreationResult,
} from '../../types/OnboardingTypes';
import { describeError, MissingInputError, OnboardingError } from '../../types/OnboardingErrors';
import { extractUserName, USER_NAME_PATH } from '../../types/CreationEventSchema';
import { EMAIL_TAG_KEY } from '../../config/onboardingConfig';
import { findTagValue } from './PrincipalDirectoryService';
import { Logger } from '../core/Logger';

export interface UserCreationNotifierDeps {
  principalDirectory: IPrincipalDirectory;
  emailParameters: IEmailParameterStore;
  temporaryPasswords: ITemporaryPasswordStore;
  logger: Logger;
}

/**
 * UserCreationNotifier - reacts to a new IAM user.
 *
 * Resolves the user's email (tag first, then Parameter Store) and the shared
 * temporary password, and logs them. Read-only; every outcome is returned as a
 * structured result, nothing is thrown to the caller.
 */
export class UserCreationNotifier {
  private deps: UserCreationNotifierDeps;

  constructor(deps: UserCreationNotifierDeps) {
    this.deps = deps;
  }

  async handle(event: unknown): Promise<UserCreationResult> {
    return toResult(await this.process(event));
  }

  async process(event: unknown): Promise<NotificationOutcome> {
    const { logger } = this.deps;
    logger.info('Received event', { event });

    const userName = extractUserName(event);
    if (!userName) {
      const missing = new MissingInputError(USER_NAME_PATH);
      logger.warn('No username found in the event', { error_code: missing.error_code });
      return { kind: 'SKIPPED', reason: missing.message };
    }

    try {
      const email = await this.resolveEmail(userName);
      const temporaryPassword = await this.deps.temporaryPasswords.getTemporaryPassword();

      logger.info(`User Created: ${userName}`);
      logger.info(`User Email: ${email ?? 'not found'}`);
      logger.info(`Temporary Password: ${temporaryPassword}`);

      return { kind: 'PROCESSED', userName, email };
    } catch (error) {
      const message = describeError(error);
      logger.error(`Error processing user creation: ${message}`, { userName });
      return {
        kind: 'FAILED',
        userName,
        errorClass: error instanceof OnboardingError ? error.error_class : 'UNKNOWN',
        errorCode: error instanceof OnboardingError ? error.error_code : 'UNHANDLED',
        message,
      };
    }
  }

  private async resolveEmail(userName: string): Promise<string | undefined> {
    const principal = await this.deps.principalDirectory.getPrincipal(userName);
    const tagged = findTagValue(principal.tags, EMAIL_TAG_KEY);
    if (tagged) return tagged;

    try {
      return await this.deps.emailParameters.getEmail(userName);
    } catch (error) {
      this.deps.logger.warn(`Continuing without email: ${describeError(error)}`, { userName });
      return undefined;
    }
  }
}

export function toResult(outcome: NotificationOutcome): UserCreationResult {
  switch (outcome.kind) {
    case 'PROCESSED':
      return { statusCode: 200, body: `Successfully processed user creation for ${outcome.userName}` };
    case 'SKIPPED':
      return { statusCode: 200, body: 'No username found in the event; nothing to process' };
    case 'FAILED':
      return { statusCode: 500, body: `Error processing user creation: ${outcome.message}` };
  }
}
