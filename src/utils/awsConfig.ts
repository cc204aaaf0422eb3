import { fromEnv, fromIni, fromNodeProviderChain } from '@aws-sdk/credential-providers';
import { logger } from './logger';

export const DEFAULT_REGION = 'us-east-1';

/**
 * A QuickSight instance: the AWS profile whose credentials reach the account,
 * and the region the assets live in.
 */
export interface InstanceConfig {
  profile?: string;
  region: string;
  accountId?: string;
}

type CredentialProvider =
  | ReturnType<typeof fromIni>
  | ReturnType<typeof fromEnv>
  | ReturnType<typeof fromNodeProviderChain>;

export interface AwsClientConfig {
  region: string;
  credentials: CredentialProvider;
  maxAttempts: number;
  retryMode: 'adaptive';
}

export function describeInstance(instance: InstanceConfig): string {
  return `${instance.profile || 'default credentials'} (${instance.region})`;
}

/**
 * Shared AWS configuration for every SDK client of one instance
 */
export function getAwsConfig(instance: InstanceConfig, maxAttempts = 5): AwsClientConfig {
  let credentials: CredentialProvider;

  if (instance.profile) {
    credentials = fromIni({ profile: instance.profile });
  } else if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
    // Use fromEnv to ensure we only use environment variables, not profile
    logger.debug('Using explicit AWS credentials from environment variables');
    credentials = fromEnv();
  } else {
    credentials = fromNodeProviderChain();
  }

  return {
    region: instance.region,
    credentials,
    maxAttempts,
    retryMode: 'adaptive',
  };
}
