import {
  DescribeDataSetCommand,
} from '@aws-sdk/client-quicksight';
import { BaseAssetProcessor } from '../core/BaseAssetProcessor';
import { DataSetAsset } from '../../../types';
import { dataSetDependencies } from '../../bundle/dependencies';
import { UnsupportedAssetError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';

export class DatasetProcessor extends BaseAssetProcessor<DataSetAsset> {
  readonly kind = 'dataset' as const;

  async exportAsset(dataSetId: string): Promise<DataSetAsset> {
    logger.debug(`Processing dataset ${dataSetId}`);

    const [detailResponse, [permissions, tags]] = await Promise.all([
      this.executeWithRetry(
        () => this.client.send(new DescribeDataSetCommand({
          AwsAccountId: this.context.awsAccountId,
          DataSetId: dataSetId,
        })),
        `DescribeDataSet(${dataSetId})`,
      ),
      this.fetchPermissionsAndTags(dataSetId, this.buildArn(dataSetId)),
    ]).catch((error: unknown) => this.rethrowDescribeError(error, dataSetId));

    const dataSet = detailResponse.DataSet;
    if (!dataSet?.PhysicalTableMap || !dataSet.ImportMode) {
      // Uploaded file datasets come back without a table map
      throw new UnsupportedAssetError(`Dataset ${dataSetId} has no physical tables (uploaded file datasets cannot be synchronized)`);
    }

    return {
      kind: this.kind,
      id: dataSetId,
      name: dataSet.Name ?? dataSetId,
      arn: dataSet.Arn ?? this.buildArn(dataSetId),
      dependencies: dataSetDependencies(dataSet),
      permissions,
      tags,
      definition: {
        PhysicalTableMap: dataSet.PhysicalTableMap,
        LogicalTableMap: dataSet.LogicalTableMap,
        OutputColumns: dataSet.OutputColumns ?? [],
        ImportMode: dataSet.ImportMode,
        ColumnGroups: dataSet.ColumnGroups,
        FieldFolders: dataSet.FieldFolders,
        RowLevelPermissionDataSet: dataSet.RowLevelPermissionDataSet,
        RowLevelPermissionTagConfiguration: dataSet.RowLevelPermissionTagConfiguration,
        ColumnLevelPermissionRules: dataSet.ColumnLevelPermissionRules,
        DataSetUsageConfiguration: dataSet.DataSetUsageConfiguration,
        DatasetParameters: dataSet.DatasetParameters,
      },
    };
  }
}
