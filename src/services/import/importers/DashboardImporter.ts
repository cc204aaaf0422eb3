import {
  CreateDashboardCommand,
  DescribeDashboardCommand,
  UpdateDashboardCommand,
  UpdateDashboardPublishedVersionCommand,
} from '@aws-sdk/client-quicksight';
import type { DashboardPublishOptions, DashboardVersionDefinition } from '@aws-sdk/client-quicksight';
import { BaseAssetImporter, WriteOutcome } from '../core/BaseAssetImporter';
import { ImportedAsset, PlannedAsset } from '../core/types';
import { AssetPermission } from '../../permissions.service';
import { AssetTag } from '../../tag.service';
import { DashboardAsset } from '../../../types';
import { getIdFromArn } from '../../../utils/arn';
import { AssetCreationError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';

interface TargetDashboard {
  Definition: DashboardVersionDefinition;
  ThemeArn?: string;
  DashboardPublishOptions?: DashboardPublishOptions;
  VersionDescription?: string;
}

/**
 * `arn:aws:quicksight:<region>:<account>:dashboard/<id>/version/<n>`
 */
export function versionNumberFromArn(versionArn: string): number | undefined {
  const version = Number.parseInt(getIdFromArn(versionArn), 10);
  return Number.isNaN(version) ? undefined : version;
}

export class DashboardImporter extends BaseAssetImporter<DashboardAsset> {
  readonly kind = 'dashboard' as const;

  protected async create(planned: PlannedAsset<DashboardAsset>, permissions: AssetPermission[], tags: AssetTag[]): Promise<WriteOutcome> {
    const response = await this.client.send(new CreateDashboardCommand({
      AwsAccountId: this.context.awsAccountId,
      DashboardId: planned.targetId,
      Name: planned.targetName,
      ...this.targetDefinition(planned),
      Permissions: permissions.length > 0 ? permissions : undefined,
      Tags: tags.length > 0 ? tags : undefined,
    }));
    return { arn: response.Arn, versionArn: response.VersionArn };
  }

  protected async update(planned: PlannedAsset<DashboardAsset>): Promise<WriteOutcome> {
    const response = await this.client.send(new UpdateDashboardCommand({
      AwsAccountId: this.context.awsAccountId,
      DashboardId: planned.targetId,
      Name: planned.targetName,
      ...this.targetDefinition(planned),
    }));
    return { arn: response.Arn, versionArn: response.VersionArn };
  }

  /**
   * Every create or update adds a dashboard version; readers only see it once
   * it is published
   */
  protected async afterWrite(planned: PlannedAsset<DashboardAsset>, outcome: WriteOutcome, imported: ImportedAsset): Promise<ImportedAsset> {
    const { targetId } = planned;
    const version = outcome.versionArn ? versionNumberFromArn(outcome.versionArn) : undefined;
    if (version === undefined) {
      throw new AssetCreationError(`QuickSight returned no version for dashboard ${targetId}`);
    }

    await this.waitUntilSettled(targetId, async () => {
      const response = await this.client.send(new DescribeDashboardCommand({
        AwsAccountId: this.context.awsAccountId,
        DashboardId: targetId,
        VersionNumber: version,
      }));
      return {
        status: response.Dashboard?.Version?.Status,
        errors: response.Dashboard?.Version?.Errors?.map(error => `${error.Type}: ${error.Message}`),
      };
    });

    await this.executeWithRetry(
      () => this.client.send(new UpdateDashboardPublishedVersionCommand({
        AwsAccountId: this.context.awsAccountId,
        DashboardId: targetId,
        VersionNumber: version,
      })),
      `UpdateDashboardPublishedVersion(${targetId})`,
    );
    logger.info(`Published version ${version} of dashboard ${targetId}`, { kind: this.kind, assetId: targetId });

    return { ...imported, version };
  }

  private targetDefinition(planned: PlannedAsset<DashboardAsset>): TargetDashboard {
    const by = this.referenceLabel(planned);
    const { definition } = planned.asset;
    return {
      Definition: this.remapper.definition(definition.Definition, by),
      ThemeArn: this.remapper.themeArn(definition.ThemeArn, by),
      DashboardPublishOptions: definition.DashboardPublishOptions,
      VersionDescription: definition.VersionDescription,
    };
  }
}
