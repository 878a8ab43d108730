import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdaNodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as events from 'aws-cdk-lib/aws-events';
import * as eventsTargets from 'aws-cdk-lib/aws-events-targets';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as path from 'path';
import { Construct } from 'constructs';
import { EMAIL_PARAMETER_PREFIX, LogLevel, TEMP_PASSWORD_SECRET_ID } from '../../config/onboardingConfig';

export interface UserCreationNotificationProps {
  readonly temporaryPasswordSecret: secretsmanager.ISecret;
  readonly logLevel?: LogLevel;
}

/**
 * Construct for the user creation notification flow
 * Lambda function plus the EventBridge rule matching CloudTrail CreateUser calls
 */
export class UserCreationNotification extends Construct {
  public readonly handler: lambda.Function;
  public readonly rule: events.Rule;

  constructor(scope: Construct, id: string, props: UserCreationNotificationProps) {
    super(scope, id);

    // AWS_REGION is set by the Lambda runtime
    this.handler = new lambdaNodejs.NodejsFunction(this, 'UserCreationNotificationFunction', {
      entry: path.join(__dirname, '../../handlers/identity/user-creation-notification-handler.ts'),
      handler: 'handler',
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.seconds(60),
      memorySize: 256,
      description: 'Logs email and temporary password for newly created IAM users',
      environment: {
        EMAIL_PARAMETER_PREFIX,
        TEMP_PASSWORD_SECRET_ID,
        LOG_LEVEL: props.logLevel ?? 'info',
      },
    });

    // AWSLambdaBasicExecutionRole is attached by default
    this.handler.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['ssm:GetParameter', 'iam:GetUser'],
        resources: ['*'],
      })
    );
    props.temporaryPasswordSecret.grantRead(this.handler);

    this.rule = new events.Rule(this, 'UserCreationEventRule', {
      ruleName: 'IAMUserCreationRule',
      description: 'Rule to detect IAM user creation events',
      enabled: true,
      eventPattern: {
        source: ['aws.iam'],
        detailType: ['AWS API Call via CloudTrail'],
        detail: {
          eventSource: ['iam.amazonaws.com'],
          eventName: ['CreateUser'],
        },
      },
    });

    // LambdaFunction target also grants events.amazonaws.com invoke permission scoped to the rule
    this.rule.addTarget(new eventsTargets.LambdaFunction(this.handler));
  }
}
