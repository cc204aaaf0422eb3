import {
  CreateDataSourceCommand,
  UpdateDataSourceCommand,
  DataSourceCredentials,
} from '@aws-sdk/client-quicksight';
import { BaseAssetImporter, WriteOutcome } from '../core/BaseAssetImporter';
import { PlannedAsset } from '../core/types';
import { AssetPermission } from '../../permissions.service';
import { AssetTag } from '../../tag.service';
import { DataSourceAsset } from '../../../types';

export class DatasourceImporter extends BaseAssetImporter<DataSourceAsset> {
  readonly kind = 'datasource' as const;

  protected async create(planned: PlannedAsset<DataSourceAsset>, permissions: AssetPermission[], tags: AssetTag[]): Promise<WriteOutcome> {
    const { definition } = planned.asset;
    const response = await this.client.send(new CreateDataSourceCommand({
      AwsAccountId: this.context.awsAccountId,
      DataSourceId: planned.targetId,
      Name: planned.targetName,
      Type: definition.Type,
      DataSourceParameters: this.remapper.dataSourceParameters(definition.DataSourceParameters),
      Credentials: this.credentialsFor(planned),
      VpcConnectionProperties: this.remapper.vpcConnection(definition.VpcConnectionProperties),
      SslProperties: definition.SslProperties,
      Permissions: permissions.length > 0 ? permissions : undefined,
      Tags: tags.length > 0 ? tags : undefined,
    }));
    return { arn: response.Arn };
  }

  // Type cannot change on update
  protected async update(planned: PlannedAsset<DataSourceAsset>): Promise<WriteOutcome> {
    const { definition } = planned.asset;
    const response = await this.client.send(new UpdateDataSourceCommand({
      AwsAccountId: this.context.awsAccountId,
      DataSourceId: planned.targetId,
      Name: planned.targetName,
      DataSourceParameters: this.remapper.dataSourceParameters(definition.DataSourceParameters),
      Credentials: this.credentialsFor(planned),
      VpcConnectionProperties: this.remapper.vpcConnection(definition.VpcConnectionProperties),
      SslProperties: definition.SslProperties,
    }));
    return { arn: response.Arn };
  }

  private credentialsFor(planned: PlannedAsset<DataSourceAsset>): DataSourceCredentials | undefined {
    return this.remapper.dataSourceCredentials(this.context.options.dataSourceCredentials[planned.asset.id]);
  }
}
