/**
 * Onboarding config: onboarded users, resource names and handler environment.
 */

import { z } from 'zod';

export const TEMP_PASSWORD_SECRET_ID = 'IAMUsersTemporaryPassword';
export const EMAIL_PARAMETER_PREFIX = '/IAM/Users';
export const EMAIL_TAG_KEY = 'Email';

export interface OnboardedGroupConfig {
  readonly groupName: string;
  readonly managedPolicyName: string;
}

export interface OnboardedUserConfig {
  /** Construct id prefix, e.g. S3User */
  readonly id: string;
  readonly userName: string;
  readonly group: OnboardedGroupConfig;
  /** Stack prop carrying the user's email */
  readonly emailProp: 's3UserEmail' | 'ec2UserEmail';
}

export const ONBOARDED_USERS: readonly OnboardedUserConfig[] = [
  {
    id: 'S3User',
    userName: 's3-user',
    group: { groupName: 'S3ReadOnlyGroup', managedPolicyName: 'AmazonS3ReadOnlyAccess' },
    emailProp: 's3UserEmail',
  },
  {
    id: 'EC2User',
    userName: 'ec2-user',
    group: { groupName: 'EC2ReadOnlyGroup', managedPolicyName: 'AmazonEC2ReadOnlyAccess' },
    emailProp: 'ec2UserEmail',
  },
];

/** `/IAM/Users/{name}/Email` */
export function emailParameterName(userName: string, prefix: string = EMAIL_PARAMETER_PREFIX): string {
  return `${prefix.replace(/\/+$/, '')}/${userName}/Email`;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validate a LOG_LEVEL value before it is deployed into a function environment.
 * Unset or empty yields undefined; anything outside LOG_LEVELS throws.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new Error(`Invalid LOG_LEVEL "${value}"; expected one of ${LOG_LEVELS.join(', ')}`);
  }
  return normalized;
}

const emptyToUndefined = (val: unknown) => (val === '' || val == null ? undefined : val);

const NotificationEnvSchema = z.object({
  AWS_REGION: z.preprocess(emptyToUndefined, z.string().default('us-east-1')),
  EMAIL_PARAMETER_PREFIX: z.preprocess(
    emptyToUndefined,
    z.string().startsWith('/', 'EMAIL_PARAMETER_PREFIX must start with /').default(EMAIL_PARAMETER_PREFIX)
  ),
  TEMP_PASSWORD_SECRET_ID: z.preprocess(emptyToUndefined, z.string().default(TEMP_PASSWORD_SECRET_ID)),
  LOG_LEVEL: z.preprocess(
    (val) => (typeof val === 'string' && val !== '' ? val.toLowerCase() : undefined),
    z.enum(LOG_LEVELS).default('info')
  ),
});

export interface NotificationConfig {
  region: string;
  emailParameterPrefix: string;
  temporaryPasswordSecretId: string;
  logLevel: LogLevel;
}

/**
 * Resolve handler config from the environment. Throws on invalid values.
 */
export function loadNotificationConfig(env: NodeJS.ProcessEnv = process.env): NotificationConfig {
  const parsed = NotificationEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid notification config: ${issues}`);
  }
  return {
    region: parsed.data.AWS_REGION,
    emailParameterPrefix: parsed.data.EMAIL_PARAMETER_PREFIX,
    temporaryPasswordSecretId: parsed.data.TEMP_PASSWORD_SECRET_ID,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
