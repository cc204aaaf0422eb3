import { z } from 'zod';
import { DataSetImportMode } from '@aws-sdk/client-quicksight';
import type {
  AnalysisDefinition,
  ColumnGroup,
  ColumnLevelPermissionRule,
  DashboardPublishOptions,
  DashboardVersionDefinition,
  DataSetUsageConfiguration,
  DatasetParameter,
  DataSourceParameters,
  DataSourceType,
  FieldFolder,
  LogicalTable,
  OutputColumn,
  PhysicalTable,
  RowLevelPermissionDataSet,
  RowLevelPermissionTagConfiguration,
  ThemeConfiguration,
} from '@aws-sdk/client-quicksight';

export const BUNDLE_FORMAT_VERSION = 1;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// QuickSight documents are carried as-is; only their outer shape is checked
const document = <T>(label: string) => z.custom<T>(isRecord, { message: `${label} must be an object` });

const PermissionSchema = z.object({
  Principal: z.string().min(1),
  Actions: z.array(z.string()),
});

const TagSchema = z.object({
  Key: z.string(),
  Value: z.string(),
});

const assetBase = {
  id: z.string().min(1),
  name: z.string(),
  arn: z.string(),
  dependencies: z.array(z.string()).default([]),
  permissions: z.array(PermissionSchema).default([]),
  tags: z.array(TagSchema).default([]),
};

const DataSourceDefinitionSchema = z.object({
  Type: z.custom<DataSourceType>(value => typeof value === 'string' && value.length > 0, { message: 'Type must be a data source type' }),
  DataSourceParameters: document<DataSourceParameters>('DataSourceParameters').optional(),
  VpcConnectionProperties: z.object({ VpcConnectionArn: z.string() }).optional(),
  SslProperties: z.object({ DisableSsl: z.boolean().optional() }).optional(),
});

const ThemeDefinitionSchema = z.object({
  BaseThemeId: z.string().min(1),
  Configuration: document<ThemeConfiguration>('Configuration'),
  VersionDescription: z.string().optional(),
});

const DataSetDefinitionSchema = z.object({
  PhysicalTableMap: z.record(z.string(), document<PhysicalTable>('PhysicalTableMap entry')),
  LogicalTableMap: z.record(z.string(), document<LogicalTable>('LogicalTableMap entry')).optional(),
  OutputColumns: z.array(document<OutputColumn>('OutputColumns entry')).default([]),
  ImportMode: z.nativeEnum(DataSetImportMode),
  ColumnGroups: z.array(document<ColumnGroup>('ColumnGroups entry')).optional(),
  FieldFolders: z.record(z.string(), document<FieldFolder>('FieldFolders entry')).optional(),
  RowLevelPermissionDataSet: document<RowLevelPermissionDataSet>('RowLevelPermissionDataSet').optional(),
  RowLevelPermissionTagConfiguration: document<RowLevelPermissionTagConfiguration>('RowLevelPermissionTagConfiguration').optional(),
  ColumnLevelPermissionRules: z.array(document<ColumnLevelPermissionRule>('ColumnLevelPermissionRules entry')).optional(),
  DataSetUsageConfiguration: document<DataSetUsageConfiguration>('DataSetUsageConfiguration').optional(),
  DatasetParameters: z.array(document<DatasetParameter>('DatasetParameters entry')).optional(),
});

const AnalysisDefinitionSchema = z.object({
  Definition: document<AnalysisDefinition>('Definition'),
  ThemeArn: z.string().optional(),
});

const DashboardDefinitionSchema = z.object({
  Definition: document<DashboardVersionDefinition>('Definition'),
  ThemeArn: z.string().optional(),
  DashboardPublishOptions: document<DashboardPublishOptions>('DashboardPublishOptions').optional(),
  VersionDescription: z.string().optional(),
});

export const BundleAssetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('datasource'), ...assetBase, definition: DataSourceDefinitionSchema }),
  z.object({ kind: z.literal('theme'), ...assetBase, definition: ThemeDefinitionSchema }),
  z.object({ kind: z.literal('dataset'), ...assetBase, definition: DataSetDefinitionSchema }),
  z.object({ kind: z.literal('analysis'), ...assetBase, definition: AnalysisDefinitionSchema }),
  z.object({ kind: z.literal('dashboard'), ...assetBase, definition: DashboardDefinitionSchema }),
]);

export const BundleManifestSchema = z.object({
  formatVersion: z.literal(BUNDLE_FORMAT_VERSION),
  sourceAccountId: z.string().min(1),
  sourceRegion: z.string().min(1),
  namespace: z.string().min(1).default('default'),
  exportedAt: z.string(),
  rootAssets: z.array(z.string()).default([]),
});

export const AssetBundleSchema = z.object({
  manifest: BundleManifestSchema,
  assets: z.array(BundleAssetSchema),
});

export type AssetBundle = z.infer<typeof AssetBundleSchema>;
export type BundleManifest = z.infer<typeof BundleManifestSchema>;
export type BundleAsset = z.infer<typeof BundleAssetSchema>;
export type AssetOfKind<K extends BundleAsset['kind']> = Extract<BundleAsset, { kind: K }>;

export type DataSourceAsset = AssetOfKind<'datasource'>;
export type ThemeAsset = AssetOfKind<'theme'>;
export type DataSetAsset = AssetOfKind<'dataset'>;
export type AnalysisAsset = AssetOfKind<'analysis'>;
export type DashboardAsset = AssetOfKind<'dashboard'>;

export type DataSetDefinition = DataSetAsset['definition'];
