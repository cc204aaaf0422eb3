import {
  CreateDataSetCommand,
  DescribeDataSetCommand,
  UpdateDataSetCommand,
} from '@aws-sdk/client-quicksight';
import type { LogicalTable, OutputColumn, PhysicalTable } from '@aws-sdk/client-quicksight';
import { BaseAssetImporter, WriteOutcome } from '../core/BaseAssetImporter';
import { PlannedAsset } from '../core/types';
import { AssetPermission } from '../../permissions.service';
import { AssetTag } from '../../tag.service';
import { DataSetAsset, DataSetDefinition } from '../../../types';
import { ColumnChange, SchemaMismatchError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';

type TargetDataSet = Omit<DataSetDefinition, 'OutputColumns'>;

function mapValues<T>(record: Record<string, T>, transform: (value: T) => T): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = transform(value);
  }
  return result;
}

/**
 * Columns of the existing dataset that the incoming one drops or retypes.
 * Added columns are not a change.
 */
export function compareOutputColumns(existing: OutputColumn[], incoming: OutputColumn[]): ColumnChange[] {
  const incomingByName = new Map<string, OutputColumn>();
  for (const column of incoming) {
    if (column.Name) {
      incomingByName.set(column.Name, column);
    }
  }

  const changes: ColumnChange[] = [];
  for (const column of existing) {
    if (!column.Name) continue;
    const match = incomingByName.get(column.Name);
    if (!match) {
      changes.push({ column: column.Name, change: 'removed' });
    } else if (match.Type !== column.Type) {
      changes.push({ column: column.Name, change: 'type-changed', existingType: column.Type, incomingType: match.Type });
    }
  }
  return changes;
}

export class DatasetImporter extends BaseAssetImporter<DataSetAsset> {
  readonly kind = 'dataset' as const;

  protected async create(planned: PlannedAsset<DataSetAsset>, permissions: AssetPermission[], tags: AssetTag[]): Promise<WriteOutcome> {
    const response = await this.client.send(new CreateDataSetCommand({
      AwsAccountId: this.context.awsAccountId,
      DataSetId: planned.targetId,
      Name: planned.targetName,
      ...this.targetDefinition(planned),
      Permissions: permissions.length > 0 ? permissions : undefined,
      Tags: tags.length > 0 ? tags : undefined,
    }));
    return { arn: response.Arn, ingestionId: response.IngestionId };
  }

  protected async update(planned: PlannedAsset<DataSetAsset>): Promise<WriteOutcome> {
    const response = await this.client.send(new UpdateDataSetCommand({
      AwsAccountId: this.context.awsAccountId,
      DataSetId: planned.targetId,
      Name: planned.targetName,
      ...this.targetDefinition(planned),
    }));
    return { arn: response.Arn, ingestionId: response.IngestionId };
  }

  protected async beforeOverwrite(planned: PlannedAsset<DataSetAsset>): Promise<void> {
    const response = await this.executeWithRetry(
      () => this.client.send(new DescribeDataSetCommand({
        AwsAccountId: this.context.awsAccountId,
        DataSetId: planned.targetId,
      })),
      `DescribeDataSet(${planned.targetId})`,
    );

    const changes = compareOutputColumns(response.DataSet?.OutputColumns || [], planned.asset.definition.OutputColumns);
    if (changes.length === 0) {
      return;
    }
    if (!this.context.options.allowSchemaChanges) {
      throw new SchemaMismatchError(planned.targetId, changes);
    }
    logger.warn(`Overwriting dataset ${planned.targetId} with ${changes.length} column changes`, { kind: this.kind, assetId: planned.targetId });
  }

  // OutputColumns are computed by QuickSight and rejected on write
  private targetDefinition(planned: PlannedAsset<DataSetAsset>): TargetDataSet {
    const by = this.referenceLabel(planned);
    const definition = planned.asset.definition;

    return {
      PhysicalTableMap: mapValues<PhysicalTable>(definition.PhysicalTableMap, table => this.remapper.physicalTable(table, by)),
      LogicalTableMap: definition.LogicalTableMap
        && mapValues<LogicalTable>(definition.LogicalTableMap, table => this.remapper.logicalTable(table, by)),
      ImportMode: definition.ImportMode,
      ColumnGroups: definition.ColumnGroups,
      FieldFolders: definition.FieldFolders,
      RowLevelPermissionDataSet: this.remapper.rowLevelPermissionDataSet(definition.RowLevelPermissionDataSet, by),
      RowLevelPermissionTagConfiguration: definition.RowLevelPermissionTagConfiguration,
      ColumnLevelPermissionRules: this.remapper.columnLevelPermissionRules(definition.ColumnLevelPermissionRules),
      DataSetUsageConfiguration: definition.DataSetUsageConfiguration,
      DatasetParameters: definition.DatasetParameters,
    };
  }
}
