import type {
  DataSet,
  DataSetIdentifierDeclaration,
  PhysicalTable,
} from '@aws-sdk/client-quicksight';
import { AssetKey, AssetKind, assetKey } from '../../types';
import { getIdFromArn, parseArn } from '../../utils/arn';

interface DeclaresDataSets {
  DataSetIdentifierDeclarations?: DataSetIdentifierDeclaration[] | undefined;
}

type DataSetReferences = Pick<DataSet, 'PhysicalTableMap' | 'LogicalTableMap' | 'RowLevelPermissionDataSet'>;

function keysFromArns(kind: AssetKind, arns: Array<string | undefined>): AssetKey[] {
  const keys: AssetKey[] = [];
  for (const arn of arns) {
    if (!arn) continue;
    const key = assetKey(kind, getIdFromArn(arn));
    if (!keys.includes(key)) {
      keys.push(key);
    }
  }
  return keys;
}

/**
 * Themes owned by AWS (starter themes such as CLASSIC) exist in every account
 * and are referenced as-is instead of being exported.
 */
export function isBuiltInThemeArn(arn: string): boolean {
  const { accountId } = parseArn(arn);
  return accountId === '' || accountId === 'aws';
}

export function physicalTableDataSourceArn(table: PhysicalTable): string | undefined {
  return table.RelationalTable?.DataSourceArn
    ?? table.CustomSql?.DataSourceArn
    ?? table.S3Source?.DataSourceArn;
}

export function themeDependencies(themeArn: string | undefined): AssetKey[] {
  if (!themeArn || isBuiltInThemeArn(themeArn)) {
    return [];
  }
  return [assetKey('theme', getIdFromArn(themeArn))];
}

/**
 * Datasets declared by an analysis or dashboard definition, plus its custom theme
 */
export function definitionDependencies(definition: DeclaresDataSets, themeArn?: string): AssetKey[] {
  const declarations = definition.DataSetIdentifierDeclarations || [];
  return [
    ...themeDependencies(themeArn),
    ...keysFromArns('dataset', declarations.map(declaration => declaration.DataSetArn)),
  ];
}

/**
 * Data sources behind the physical tables, datasets joined in through logical
 * table sources, and the row-level security dataset
 */
export function dataSetDependencies(dataSet: DataSetReferences): AssetKey[] {
  const physicalTables = Object.values(dataSet.PhysicalTableMap || {});
  const logicalTables = Object.values(dataSet.LogicalTableMap || {});

  const dataSources = keysFromArns('datasource', physicalTables.map(physicalTableDataSourceArn));
  const dataSets = keysFromArns('dataset', [
    ...logicalTables.map(table => table.Source?.DataSetArn),
    dataSet.RowLevelPermissionDataSet?.Arn,
  ]);

  return [...dataSources, ...dataSets];
}
