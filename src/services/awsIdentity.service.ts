import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { AwsClientConfig, InstanceConfig, describeInstance, getAwsConfig } from '../utils/awsConfig';
import { logger } from '../utils/logger';

export interface AWSIdentityInfo {
  accountId: string;
  userId?: string;
  arn?: string;
  profileName?: string;
  region: string;
}

export class AWSIdentityService {
  private stsClient: STSClient;
  private identityInfo: AWSIdentityInfo | null = null;

  constructor(private readonly instance: InstanceConfig, config: AwsClientConfig = getAwsConfig(instance)) {
    this.stsClient = new STSClient(config);
  }

  async getIdentity(): Promise<AWSIdentityInfo> {
    if (this.identityInfo) {
      return this.identityInfo;
    }

    const response = await this.stsClient.send(new GetCallerIdentityCommand({})).catch((error: unknown) => {
      logger.error(`Failed to get AWS identity for ${describeInstance(this.instance)}:`, error);
      throw new Error(`Failed to authenticate with AWS as ${describeInstance(this.instance)}. Please check your credentials.`, { cause: error });
    });
    const account = response.Account;

    if (!account) {
      throw new Error(`STS returned no account for ${describeInstance(this.instance)}`);
    }

    this.identityInfo = {
      accountId: account,
      userId: response.UserId,
      arn: response.Arn,
      profileName: this.instance.profile,
      region: this.instance.region,
    };

    logger.info('AWS identity retrieved', {
      accountId: this.identityInfo.accountId,
      arn: this.identityInfo.arn,
      profileName: this.identityInfo.profileName,
    });

    return this.identityInfo;
  }

  /**
   * The account id configured for the instance, or the caller's account from STS
   */
  async resolveAccountId(): Promise<string> {
    if (this.instance.accountId) {
      return this.instance.accountId;
    }
    const identity = await this.getIdentity();
    return identity.accountId;
  }
}
