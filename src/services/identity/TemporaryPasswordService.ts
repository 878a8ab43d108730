import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { ITemporaryPasswordStore } from '../../types/OnboardingTypes';
import { SecretAccessError } from '../../types/OnboardingErrors';
import { TEMP_PASSWORD_SECRET_ID } from '../../config/onboardingConfig';

/**
 * TemporaryPasswordService - shared initial console password from Secrets Manager
 */
export class TemporaryPasswordService implements ITemporaryPasswordStore {
  private secretsClient: SecretsManagerClient;
  private secretId: string;

  constructor(secretsClient: SecretsManagerClient, secretId: string = TEMP_PASSWORD_SECRET_ID) {
    this.secretsClient = secretsClient;
    this.secretId = secretId;
  }

  async getTemporaryPassword(): Promise<string> {
    let secretString: string | undefined;
    try {
      const response = await this.secretsClient.send(new GetSecretValueCommand({ SecretId: this.secretId }));
      secretString = response.SecretString;
    } catch (error) {
      throw new SecretAccessError(this.secretId, error);
    }

    if (secretString === undefined) {
      throw new SecretAccessError(this.secretId, new Error('secret has no SecretString'));
    }
    return secretString;
  }
}
