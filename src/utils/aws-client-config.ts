/**
 * AWS Client Configuration Helper
 *
 * Builds SDK client configuration. Static credentials from the environment are
 * passed through when present; otherwise the SDK default provider chain applies
 * (the Lambda execution role in deployed functions).
 */

export interface AWSClientConfig {
  region?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
}

export function getAWSClientConfig(region?: string, env: NodeJS.ProcessEnv = process.env): AWSClientConfig {
  const config: AWSClientConfig = { region: region || env.AWS_REGION };

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      ...(env.AWS_SESSION_TOKEN ? { sessionToken: env.AWS_SESSION_TOKEN } : {}),
    };
  }

  return config;
}
