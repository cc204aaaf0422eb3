import { QuickSightClient } from '@aws-sdk/client-quicksight';
import { PermissionsService, AssetPermission } from '../../permissions.service';
import { TagService, AssetTag } from '../../tag.service';
import { BundleAsset } from '../../../types';
import { buildQuickSightArn } from '../../../utils/arn';
import { RetryOptions, getErrorFields, withRetry } from '../../../utils/awsRetry';
import { AssetNotFoundError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';

import { IAssetProcessor } from './interfaces';
import { ExportContext } from './types';

export abstract class BaseAssetProcessor<A extends BundleAsset> implements IAssetProcessor<A> {
  protected readonly retryOptions: RetryOptions;

  constructor(
    protected readonly client: QuickSightClient,
    protected readonly permissionsService: PermissionsService,
    protected readonly tagService: TagService,
    protected readonly context: ExportContext,
  ) {
    this.retryOptions = context.retry ?? {
      maxRetries: 5,
      baseDelay: 500,
      maxDelay: 5000,
    };
  }

  abstract readonly kind: A['kind'];
  abstract exportAsset(assetId: string): Promise<A>;

  protected async executeWithRetry<T>(
    operation: () => Promise<T>,
    context: string,
  ): Promise<T> {
    return withRetry(operation, context, this.retryOptions);
  }

  protected buildArn(assetId: string): string {
    return buildQuickSightArn(this.context.region, this.context.awsAccountId, this.kind, assetId);
  }

  /**
   * Permissions and tags are carried along when readable; failing to read them
   * does not stop the export
   */
  protected async fetchPermissionsAndTags(assetId: string, arn: string): Promise<[AssetPermission[], AssetTag[]]> {
    return Promise.all([
      this.context.includePermissions
        ? this.executeWithRetry(
          () => this.permissionsService.getPermissions(this.kind, assetId),
          `Describe${this.kind}Permissions(${assetId})`,
        ).catch((error: unknown) => {
          logger.warn(`Failed to get permissions for ${this.kind} ${assetId}: ${getErrorFields(error).message}`);
          return [];
        })
        : Promise.resolve([]),
      this.context.includeTags
        ? this.executeWithRetry(
          () => this.tagService.getResourceTags(arn),
          `ListTagsForResource(${assetId})`,
        ).catch((error: unknown) => {
          logger.warn(`Failed to get tags for ${this.kind} ${assetId}: ${getErrorFields(error).message}`);
          return [];
        })
        : Promise.resolve([]),
    ]);
  }

  protected rethrowDescribeError(error: unknown, assetId: string): never {
    const { name, message } = getErrorFields(error);
    if (name === 'ResourceNotFoundException') {
      throw new AssetNotFoundError(this.kind, assetId, message);
    }
    throw error;
  }
}
