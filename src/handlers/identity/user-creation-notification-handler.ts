/**
 * User Creation Notification Handler
 *
 * Invoked by the IAMUserCreationRule EventBridge rule for CloudTrail CreateUser
 * calls. Logs the new user's email and the shared temporary password.
 */

import { EventBridgeEvent } from 'aws-lambda';
import { IAMClient } from '@aws-sdk/client-iam';
import { SSMClient } from '@aws-sdk/client-ssm';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { Logger } from '../../services/core/Logger';
import { PrincipalDirectoryService } from '../../services/identity/PrincipalDirectoryService';
import { EmailParameterService } from '../../services/identity/EmailParameterService';
import { TemporaryPasswordService } from '../../services/identity/TemporaryPasswordService';
import { UserCreationNotifier } from '../../services/identity/UserCreationNotifier';
import { loadNotificationConfig } from '../../config/onboardingConfig';
import { getAWSClientConfig } from '../../utils/aws-client-config';
import { UserCreationResult } from '../../types/OnboardingTypes';

const config = loadNotificationConfig();
const logger = new Logger('UserCreationNotificationHandler', undefined, config.logLevel);

// Initialize AWS clients
const clientConfig = getAWSClientConfig(config.region);
// IAM is a global service; the SDK resolves its endpoint from any region
const iamClient = new IAMClient(clientConfig);
const ssmClient = new SSMClient(clientConfig);
const secretsClient = new SecretsManagerClient(clientConfig);

const notifier = new UserCreationNotifier({
  principalDirectory: new PrincipalDirectoryService(iamClient, logger),
  emailParameters: new EmailParameterService(ssmClient, config.emailParameterPrefix),
  temporaryPasswords: new TemporaryPasswordService(secretsClient, config.temporaryPasswordSecretId),
  logger,
});

export type CloudTrailApiCallDetail = {
  eventSource?: string;
  eventName?: string;
  requestParameters?: { userName?: string } | null;
};

export const handler = async (
  event: EventBridgeEvent<'AWS API Call via CloudTrail', CloudTrailApiCallDetail>
): Promise<UserCreationResult> => {
  return notifier.handle(event);
};
