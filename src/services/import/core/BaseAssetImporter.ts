import { QuickSightClient, ResourceStatus } from '@aws-sdk/client-quicksight';
import { PermissionsService, AssetPermission } from '../../permissions.service';
import { TagService, AssetTag } from '../../tag.service';
import { BundleAsset, assetKey } from '../../../types';
import { buildQuickSightArn } from '../../../utils/arn';
import { RetryOptions, getErrorFields, sleep, withRetry } from '../../../utils/awsRetry';
import { AssetConflictError, AssetCreationError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';
import { buildTargetPermissions } from '../permissionMapper';
import { ReferenceRemapper } from '../referenceRemapper';

import { IAssetImporter } from './interfaces';
import { ImportAction, ImportContext, ImportedAsset, PlannedAsset } from './types';

export interface WriteOutcome {
  arn?: string;
  versionArn?: string;
  ingestionId?: string;
}

export interface ResourceState {
  status?: ResourceStatus | string;
  errors?: string[];
}

const SETTLED_STATUSES: string[] = [ResourceStatus.CREATION_SUCCESSFUL, ResourceStatus.UPDATE_SUCCESSFUL];
const FAILED_STATUSES: string[] = [ResourceStatus.CREATION_FAILED, ResourceStatus.UPDATE_FAILED];

export abstract class BaseAssetImporter<A extends BundleAsset> implements IAssetImporter<A> {
  protected readonly retryOptions: RetryOptions;
  protected readonly remapper: ReferenceRemapper;

  constructor(
    protected readonly client: QuickSightClient,
    protected readonly permissionsService: PermissionsService,
    protected readonly tagService: TagService,
    protected readonly context: ImportContext,
  ) {
    this.retryOptions = context.options.retry ?? {
      maxRetries: 5,
      baseDelay: 500,
      maxDelay: 5000,
    };
    this.remapper = new ReferenceRemapper(context);
  }

  abstract readonly kind: A['kind'];

  protected abstract create(planned: PlannedAsset<A>, permissions: AssetPermission[], tags: AssetTag[]): Promise<WriteOutcome>;

  protected abstract update(planned: PlannedAsset<A>): Promise<WriteOutcome>;

  /**
   * Runs before an existing target is updated in place
   */
  protected async beforeOverwrite(_planned: PlannedAsset<A>): Promise<void> {}

  /**
   * Runs once the asset was created or updated
   */
  protected async afterWrite(_planned: PlannedAsset<A>, _outcome: WriteOutcome, imported: ImportedAsset): Promise<ImportedAsset> {
    return imported;
  }

  async importAsset(planned: PlannedAsset<A>): Promise<ImportedAsset> {
    const { asset, targetId, targetName } = planned;

    logger.info(`Importing ${this.kind} ${asset.id} as ${targetId}`, { kind: this.kind, assetId: targetId });

    const { action, outcome } = await this.write(planned);
    const arn = outcome.arn ?? this.buildArn(targetId);

    this.context.identifiers.register({ kind: this.kind, sourceId: asset.id, targetId, targetArn: arn });

    const imported: ImportedAsset = {
      kind: this.kind,
      sourceId: asset.id,
      targetId,
      name: targetName,
      arn,
      action,
      ingestionId: outcome.ingestionId,
    };

    return action === 'skipped' ? imported : this.afterWrite(planned, outcome, imported);
  }

  private async write(planned: PlannedAsset<A>): Promise<{ action: ImportAction; outcome: WriteOutcome }> {
    const { targetId } = planned;
    const permissions = this.targetPermissions(planned);
    const tags = this.context.options.copyTags ? planned.asset.tags : [];

    try {
      const outcome = await this.executeWithRetry(
        () => this.create(planned, permissions, tags),
        `Create ${this.kind}(${targetId})`,
      );
      return { action: 'created', outcome };
    } catch (error) {
      if (getErrorFields(error).name !== 'ResourceExistsException') {
        throw error;
      }
    }

    switch (this.context.options.conflictPolicy) {
      case 'fail':
        throw new AssetConflictError(this.kind, targetId);
      case 'skip':
        logger.info(`${this.kind} ${targetId} already exists, leaving it untouched`, { kind: this.kind, assetId: targetId });
        return { action: 'skipped', outcome: {} };
      case 'overwrite': {
        logger.info(`${this.kind} ${targetId} already exists, updating it`, { kind: this.kind, assetId: targetId });
        await this.beforeOverwrite(planned);
        const outcome = await this.executeWithRetry(
          () => this.update(planned),
          `Update ${this.kind}(${targetId})`,
        );
        await this.executeWithRetry(
          () => this.permissionsService.grantPermissions(this.kind, targetId, permissions),
          `Update ${this.kind}Permissions(${targetId})`,
        );
        await this.tagService.tagResource(outcome.arn ?? this.buildArn(targetId), tags);
        return { action: 'updated', outcome };
      }
    }
  }

  protected targetPermissions(planned: PlannedAsset<A>): AssetPermission[] {
    const { options } = this.context;
    return buildTargetPermissions(this.kind, planned.asset.permissions, {
      copySource: options.permissionPolicy === 'copy',
      grantPrincipals: options.grantPrincipals,
      remapPrincipal: principal => this.remapper.principal(principal),
    });
  }

  protected referenceLabel(planned: PlannedAsset<A>): string {
    return assetKey(this.kind, planned.asset.id);
  }

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
   * Poll until creation or update has finished
   */
  protected async waitUntilSettled(targetId: string, describe: () => Promise<ResourceState>): Promise<void> {
    const { pollInterval, maxPolls } = this.context.options.wait;

    for (let poll = 1; poll <= maxPolls; poll++) {
      const { status, errors } = await this.executeWithRetry(describe, `Describe ${this.kind}(${targetId})`);

      if (status && SETTLED_STATUSES.includes(status)) {
        return;
      }
      if (status && FAILED_STATUSES.includes(status)) {
        const detail = errors && errors.length > 0 ? `: ${errors.join('; ')}` : '';
        throw new AssetCreationError(`${this.kind} ${targetId} ended in ${status}${detail}`);
      }

      logger.debug(`${this.kind} ${targetId} is ${status ?? 'pending'}, waiting`, { kind: this.kind, assetId: targetId });
      await sleep(pollInterval);
    }

    throw new AssetCreationError(`${this.kind} ${targetId} did not finish within ${maxPolls} polls`);
  }
}
