import { IAMClient, GetUserCommand, User } from '@aws-sdk/client-iam';
import { IPrincipalDirectory, PrincipalRecord, PrincipalTag } from '../../types/OnboardingTypes';
import { LookupError } from '../../types/OnboardingErrors';
import { Logger } from '../core/Logger';

/**
 * PrincipalDirectoryService - reads IAM user records (name, ARN, tags)
 */
export class PrincipalDirectoryService implements IPrincipalDirectory {
  private iamClient: IAMClient;
  private logger: Logger;

  constructor(iamClient: IAMClient, logger: Logger) {
    this.iamClient = iamClient;
    this.logger = logger;
  }

  async getPrincipal(userName: string): Promise<PrincipalRecord> {
    let user: User | undefined;
    try {
      const response = await this.iamClient.send(new GetUserCommand({ UserName: userName }));
      user = response.User;
    } catch (error) {
      throw new LookupError(userName, error);
    }

    if (!user) {
      throw new LookupError(userName, new Error('GetUser returned no user'));
    }

    const tags: PrincipalTag[] = (user.Tags ?? []).flatMap((tag) =>
      tag.Key !== undefined && tag.Value !== undefined ? [{ key: tag.Key, value: tag.Value }] : []
    );

    this.logger.debug('Principal record loaded', { userName, tagCount: tags.length });

    return {
      userName: user.UserName ?? userName,
      arn: user.Arn,
      tags,
    };
  }
}

/** Value of the first tag with the given key */
export function findTagValue(tags: PrincipalTag[], key: string): string | undefined {
  return tags.find((tag) => tag.key === key)?.value;
}
