import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import { IdentityResources } from './constructs/IdentityResources';
import { UserCreationNotification } from './constructs/UserCreationNotification';
import { LogLevel } from '../config/onboardingConfig';

export interface UserOnboardingStackProps extends cdk.StackProps {
  readonly s3UserEmail: string;
  readonly ec2UserEmail: string;
  readonly logLevel?: LogLevel;
}

/**
 * IAM users, groups, email parameters and the shared temporary password,
 * with a Lambda notified whenever an IAM user is created.
 */
export class UserOnboardingStack extends cdk.Stack {
  public readonly identity: IdentityResources;
  public readonly notification: UserCreationNotification;

  constructor(scope: Construct, id: string, props: UserOnboardingStackProps) {
    super(scope, id, props);

    this.identity = new IdentityResources(this, 'IdentityResources', {
      s3UserEmail: props.s3UserEmail,
      ec2UserEmail: props.ec2UserEmail,
    });

    this.notification = new UserCreationNotification(this, 'UserCreationNotification', {
      temporaryPasswordSecret: this.identity.temporaryPasswordSecret,
      logLevel: props.logLevel,
    });

    new cdk.CfnOutput(this, 'TemporaryPasswordSecret', {
      value: this.identity.temporaryPasswordSecret.secretArn,
      description: 'Secret containing the temporary password',
    });

    new cdk.CfnOutput(this, 'S3User', {
      value: this.identity.user('s3-user').userName,
      description: 'IAM user with S3 read access',
    });

    new cdk.CfnOutput(this, 'EC2User', {
      value: this.identity.user('ec2-user').userName,
      description: 'IAM user with EC2 read access',
    });

    new cdk.CfnOutput(this, 'LambdaFunction', {
      value: this.notification.handler.functionName,
      description: 'Lambda function for processing user creation events',
    });
  }
}
