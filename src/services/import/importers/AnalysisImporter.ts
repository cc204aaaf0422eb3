import {
  CreateAnalysisCommand,
  DescribeAnalysisCommand,
  UpdateAnalysisCommand,
} from '@aws-sdk/client-quicksight';
import type { AnalysisDefinition } from '@aws-sdk/client-quicksight';
import { BaseAssetImporter, WriteOutcome } from '../core/BaseAssetImporter';
import { ImportedAsset, PlannedAsset } from '../core/types';
import { AssetPermission } from '../../permissions.service';
import { AssetTag } from '../../tag.service';
import { AnalysisAsset } from '../../../types';

export class AnalysisImporter extends BaseAssetImporter<AnalysisAsset> {
  readonly kind = 'analysis' as const;

  protected async create(planned: PlannedAsset<AnalysisAsset>, permissions: AssetPermission[], tags: AssetTag[]): Promise<WriteOutcome> {
    const response = await this.client.send(new CreateAnalysisCommand({
      AwsAccountId: this.context.awsAccountId,
      AnalysisId: planned.targetId,
      Name: planned.targetName,
      ...this.targetDefinition(planned),
      Permissions: permissions.length > 0 ? permissions : undefined,
      Tags: tags.length > 0 ? tags : undefined,
    }));
    return { arn: response.Arn };
  }

  protected async update(planned: PlannedAsset<AnalysisAsset>): Promise<WriteOutcome> {
    const response = await this.client.send(new UpdateAnalysisCommand({
      AwsAccountId: this.context.awsAccountId,
      AnalysisId: planned.targetId,
      Name: planned.targetName,
      ...this.targetDefinition(planned),
    }));
    return { arn: response.Arn };
  }

  protected async afterWrite(planned: PlannedAsset<AnalysisAsset>, _outcome: WriteOutcome, imported: ImportedAsset): Promise<ImportedAsset> {
    await this.waitUntilSettled(planned.targetId, async () => {
      const response = await this.client.send(new DescribeAnalysisCommand({
        AwsAccountId: this.context.awsAccountId,
        AnalysisId: planned.targetId,
      }));
      return {
        status: response.Analysis?.Status,
        errors: response.Analysis?.Errors?.map(error => `${error.Type}: ${error.Message}`),
      };
    });
    return imported;
  }

  private targetDefinition(planned: PlannedAsset<AnalysisAsset>): { Definition: AnalysisDefinition; ThemeArn?: string } {
    const by = this.referenceLabel(planned);
    const { definition } = planned.asset;
    return {
      Definition: this.remapper.definition(definition.Definition, by),
      ThemeArn: this.remapper.themeArn(definition.ThemeArn, by),
    };
  }
}
