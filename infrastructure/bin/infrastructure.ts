#!/usr/bin/env node
import 'source-map-support/register';
import 'dotenv/config';
import * as cdk from 'aws-cdk-lib';
import { UserOnboardingStack } from '../../src/stacks/UserOnboardingStack';
import { parseLogLevel } from '../../src/config/onboardingConfig';

// Fails synth on a bad value instead of deploying a function that cannot initialise
const logLevel = parseLogLevel(process.env.LOG_LEVEL);

const app = new cdk.App();

new UserOnboardingStack(app, 'UserOnboardingStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT || process.env.AWS_ACCOUNT_ID,
    region: process.env.CDK_DEFAULT_REGION || process.env.AWS_REGION || 'us-east-1',
  },
  s3UserEmail: process.env.S3_USER_EMAIL || 's3-user@example.com',
  ec2UserEmail: process.env.EC2_USER_EMAIL || 'ec2-user@example.com',
  logLevel,
});
