import { QuickSightClient } from '@aws-sdk/client-quicksight';
import { S3Client } from '@aws-sdk/client-s3';
import { AWSIdentityService } from '../services/awsIdentity.service';
import { InstanceConfig, getAwsConfig } from '../utils/awsConfig';

/**
 * Everything the commands reach outside the process through
 */
export interface CliDependencies {
  createQuickSightClient(instance: InstanceConfig): QuickSightClient;
  createS3Client(instance: InstanceConfig): S3Client;
  resolveAccountId(instance: InstanceConfig): Promise<string>;
  print(line: string): void;
}

export const defaultDependencies: CliDependencies = {
  createQuickSightClient: instance => new QuickSightClient(getAwsConfig(instance)),
  createS3Client: instance => new S3Client(getAwsConfig(instance)),
  resolveAccountId: instance => new AWSIdentityService(instance).resolveAccountId(),
  print: line => console.log(line),
};
