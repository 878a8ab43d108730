import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { IEmailParameterStore } from '../../types/OnboardingTypes';
import { EmailLookupWarning } from '../../types/OnboardingErrors';
import { emailParameterName, EMAIL_PARAMETER_PREFIX } from '../../config/onboardingConfig';

/**
 * EmailParameterService - per-user email addresses in SSM Parameter Store.
 * Failures surface as EmailLookupWarning; callers decide whether they are fatal.
 */
export class EmailParameterService implements IEmailParameterStore {
  private ssmClient: SSMClient;
  private prefix: string;

  constructor(ssmClient: SSMClient, prefix: string = EMAIL_PARAMETER_PREFIX) {
    this.ssmClient = ssmClient;
    this.prefix = prefix;
  }

  async getEmail(userName: string): Promise<string | undefined> {
    const name = emailParameterName(userName, this.prefix);
    try {
      const response = await this.ssmClient.send(
        new GetParameterCommand({
          Name: name,
          WithDecryption: true,
        })
      );
      return response.Parameter?.Value || undefined;
    } catch (error) {
      throw new EmailLookupWarning(name, error);
    }
  }
}
