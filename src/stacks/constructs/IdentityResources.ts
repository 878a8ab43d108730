import * as cdk from 'aws-cdk-lib';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as ssm from 'aws-cdk-lib/aws-ssm';
import { Construct } from 'constructs';
import {
  emailParameterName,
  ONBOARDED_USERS,
  EMAIL_TAG_KEY,
  TEMP_PASSWORD_SECRET_ID,
} from '../../config/onboardingConfig';

export interface IdentityResourcesProps {
  readonly s3UserEmail: string;
  readonly ec2UserEmail: string;
}

/**
 * Construct for the onboarded IAM users
 * Shared temporary password secret, read-only groups, users and their email parameters
 */
export class IdentityResources extends Construct {
  public readonly temporaryPasswordSecret: secretsmanager.Secret;
  public readonly users: Record<string, iam.User> = {};
  public readonly groups: Record<string, iam.Group> = {};
  public readonly emailParameters: Record<string, ssm.StringParameter> = {};

  constructor(scope: Construct, id: string, props: IdentityResourcesProps) {
    super(scope, id);

    // One generated password shared by every onboarded user
    this.temporaryPasswordSecret = new secretsmanager.Secret(this, 'TempPassword', {
      secretName: TEMP_PASSWORD_SECRET_ID,
      generateSecretString: {
        passwordLength: 16,
        excludeCharacters: '"@/\\',
        requireEachIncludedType: true,
      },
    });

    for (const user of ONBOARDED_USERS) {
      const email = props[user.emailProp];

      const group = new iam.Group(this, `${user.id}Group`, {
        groupName: user.group.groupName,
        managedPolicies: [iam.ManagedPolicy.fromAwsManagedPolicyName(user.group.managedPolicyName)],
      });

      const iamUser = new iam.User(this, user.id, {
        userName: user.userName,
        groups: [group],
        password: this.temporaryPasswordSecret.secretValue,
        passwordResetRequired: true,
      });
      cdk.Tags.of(iamUser).add(EMAIL_TAG_KEY, email);

      this.emailParameters[user.userName] = new ssm.StringParameter(this, `${user.id}EmailParameter`, {
        parameterName: emailParameterName(user.userName),
        stringValue: email,
        description: `Email address for ${user.userName}`,
      });

      this.groups[user.group.groupName] = group;
      this.users[user.userName] = iamUser;
    }
  }

  user(userName: string): iam.User {
    const found = this.users[userName];
    if (!found) {
      throw new Error(`No onboarded user named ${userName}`);
    }
    return found;
  }
}
