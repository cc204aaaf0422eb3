import {
  CreateThemeCommand,
  UpdateThemeCommand,
} from '@aws-sdk/client-quicksight';
import { BaseAssetImporter, WriteOutcome } from '../core/BaseAssetImporter';
import { PlannedAsset } from '../core/types';
import { AssetPermission } from '../../permissions.service';
import { AssetTag } from '../../tag.service';
import { ThemeAsset } from '../../../types';

export class ThemeImporter extends BaseAssetImporter<ThemeAsset> {
  readonly kind = 'theme' as const;

  protected async create(planned: PlannedAsset<ThemeAsset>, permissions: AssetPermission[], tags: AssetTag[]): Promise<WriteOutcome> {
    const { definition } = planned.asset;
    const response = await this.client.send(new CreateThemeCommand({
      AwsAccountId: this.context.awsAccountId,
      ThemeId: planned.targetId,
      Name: planned.targetName,
      BaseThemeId: definition.BaseThemeId,
      Configuration: definition.Configuration,
      VersionDescription: definition.VersionDescription,
      Permissions: permissions.length > 0 ? permissions : undefined,
      Tags: tags.length > 0 ? tags : undefined,
    }));
    return { arn: response.Arn, versionArn: response.VersionArn };
  }

  protected async update(planned: PlannedAsset<ThemeAsset>): Promise<WriteOutcome> {
    const { definition } = planned.asset;
    const response = await this.client.send(new UpdateThemeCommand({
      AwsAccountId: this.context.awsAccountId,
      ThemeId: planned.targetId,
      Name: planned.targetName,
      BaseThemeId: definition.BaseThemeId,
      Configuration: definition.Configuration,
      VersionDescription: definition.VersionDescription,
    }));
    return { arn: response.Arn, versionArn: response.VersionArn };
  }
}
