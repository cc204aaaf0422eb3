import {
  DescribeDataSourceCommand,
} from '@aws-sdk/client-quicksight';
import { BaseAssetProcessor } from '../core/BaseAssetProcessor';
import { DataSourceAsset } from '../../../types';
import { UnsupportedAssetError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';

export class DatasourceProcessor extends BaseAssetProcessor<DataSourceAsset> {
  readonly kind = 'datasource' as const;

  async exportAsset(dataSourceId: string): Promise<DataSourceAsset> {
    logger.debug(`Calling DescribeDataSource for ${dataSourceId}...`);

    const [detailResponse, [permissions, tags]] = await Promise.all([
      this.executeWithRetry(
        () => this.client.send(new DescribeDataSourceCommand({
          AwsAccountId: this.context.awsAccountId,
          DataSourceId: dataSourceId,
        })),
        `DescribeDataSource(${dataSourceId})`,
      ),
      this.fetchPermissionsAndTags(dataSourceId, this.buildArn(dataSourceId)),
    ]).catch((error: unknown) => this.rethrowDescribeError(error, dataSourceId));

    const dataSource = detailResponse.DataSource;
    if (!dataSource?.Type) {
      throw new UnsupportedAssetError(`Data source ${dataSourceId} has no type (uploaded file data sources cannot be synchronized)`);
    }

    const vpcConnectionArn = dataSource.VpcConnectionProperties?.VpcConnectionArn;

    // Credentials are never part of a bundle
    return {
      kind: this.kind,
      id: dataSourceId,
      name: dataSource.Name ?? dataSourceId,
      arn: dataSource.Arn ?? this.buildArn(dataSourceId),
      dependencies: [],
      permissions,
      tags,
      definition: {
        Type: dataSource.Type,
        DataSourceParameters: dataSource.DataSourceParameters,
        VpcConnectionProperties: vpcConnectionArn ? { VpcConnectionArn: vpcConnectionArn } : undefined,
        SslProperties: dataSource.SslProperties,
      },
    };
  }
}
