import {
  CreateAnalysisCommand,
  CreateDashboardCommand,
  CreateDataSetCommand,
  CreateDataSourceCommand,
  CreateThemeCommand,
} from '@aws-sdk/client-quicksight';
import { AssetExportOrchestrator } from '../../export/AssetExportOrchestrator';
import { parseBundle, serializeBundle } from '../../bundle/bundle.service';
import { DEFAULT_IMPORT_OPTIONS, ImportOptions } from '../../import/core/types';
import { AssetBundle } from '../../../types';
import { FakeQuickSight } from './fakeQuickSight';

export const SOURCE_ACCOUNT = '111111111111';
export const TARGET_ACCOUNT = '222222222222';
export const REGION = 'us-east-1';

export const CLASSIC_THEME_ARN = 'arn:aws:quicksight::aws:theme/CLASSIC';
export const START_DATE = new Date('2024-01-01T00:00:00.000Z');

export function userArn(accountId: string, name: string, namespace = 'default'): string {
  return `arn:aws:quicksight:${REGION}:${accountId}:user/${namespace}/${name}`;
}

/**
 * One asset of every kind: a dashboard and an analysis on the `orders`
 * dataset, which reads from `sales-db` and is filtered by `regions-rls`.
 */
export async function seedSourceAccount(fake: FakeQuickSight): Promise<void> {
  const owner = [{ Principal: userArn(fake.accountId, 'alice'), Actions: ['quicksight:DescribeDataSource', 'quicksight:UpdateDataSource'] }];

  await fake.handle(new CreateDataSourceCommand({
    AwsAccountId: fake.accountId,
    DataSourceId: 'sales-db',
    Name: 'Sales DB',
    Type: 'POSTGRESQL',
    DataSourceParameters: {
      PostgreSqlParameters: { Host: 'db.internal', Port: 5432, Database: 'sales' },
    },
    VpcConnectionProperties: {
      VpcConnectionArn: `arn:aws:quicksight:${REGION}:${fake.accountId}:vpcConnection/vpc-1`,
    },
    Credentials: { CredentialPair: { Username: 'reader', Password: 'test-secret' } },
    Permissions: owner,
    Tags: [{ Key: 'team', Value: 'analytics' }],
  }));

  await fake.handle(new CreateThemeCommand({
    AwsAccountId: fake.accountId,
    ThemeId: 'brand-theme',
    Name: 'Brand',
    BaseThemeId: 'CLASSIC',
    Configuration: { DataColorPalette: { Colors: ['#112233', '#445566'] } },
    VersionDescription: 'brand colours',
  }));

  await fake.handle(new CreateDataSetCommand({
    AwsAccountId: fake.accountId,
    DataSetId: 'regions-rls',
    Name: 'Region access',
    ImportMode: 'DIRECT_QUERY',
    PhysicalTableMap: {
      'rls-sql': {
        CustomSql: {
          DataSourceArn: fake.arn('datasource', 'sales-db'),
          Name: 'rls',
          SqlQuery: 'select region, user_name from region_access',
          Columns: [
            { Name: 'region', Type: 'STRING' },
            { Name: 'UserName', Type: 'STRING' },
          ],
        },
      },
    },
  }));

  await fake.handle(new CreateDataSetCommand({
    AwsAccountId: fake.accountId,
    DataSetId: 'orders',
    Name: 'Orders',
    ImportMode: 'SPICE',
    PhysicalTableMap: {
      'orders-physical': {
        RelationalTable: {
          DataSourceArn: fake.arn('datasource', 'sales-db'),
          Schema: 'public',
          Name: 'orders',
          InputColumns: [
            { Name: 'order_id', Type: 'INTEGER' },
            { Name: 'amount', Type: 'DECIMAL' },
            { Name: 'region', Type: 'STRING' },
          ],
        },
      },
    },
    LogicalTableMap: {
      'orders-logical': { Alias: 'orders', Source: { PhysicalTableId: 'orders-physical' } },
    },
    RowLevelPermissionDataSet: {
      Arn: fake.arn('dataset', 'regions-rls'),
      PermissionPolicy: 'GRANT_ACCESS',
    },
    Permissions: [{ Principal: userArn(fake.accountId, 'alice'), Actions: ['quicksight:DescribeDataSet', 'quicksight:PassDataSet'] }],
  }));

  await fake.handle(new CreateAnalysisCommand({
    AwsAccountId: fake.accountId,
    AnalysisId: 'sales-analysis',
    Name: 'Sales Analysis',
    ThemeArn: fake.arn('theme', 'brand-theme'),
    Definition: {
      DataSetIdentifierDeclarations: [{ Identifier: 'orders', DataSetArn: fake.arn('dataset', 'orders') }],
      Sheets: [{ SheetId: 'sheet-1', Name: 'Overview' }],
      ParameterDeclarations: [{
        DateTimeParameterDeclaration: {
          Name: 'StartDate',
          DefaultValues: { StaticValues: [START_DATE] },
          TimeGranularity: 'DAY',
        },
      }],
    },
    Permissions: [{ Principal: userArn(fake.accountId, 'alice'), Actions: ['quicksight:DescribeAnalysis', 'quicksight:UpdateAnalysis'] }],
    Tags: [{ Key: 'team', Value: 'analytics' }],
  }));

  await fake.handle(new CreateDashboardCommand({
    AwsAccountId: fake.accountId,
    DashboardId: 'sales-dashboard',
    Name: 'Sales Dashboard',
    ThemeArn: CLASSIC_THEME_ARN,
    Definition: {
      DataSetIdentifierDeclarations: [{ Identifier: 'orders', DataSetArn: fake.arn('dataset', 'orders') }],
      Sheets: [{ SheetId: 'sheet-1', Name: 'Overview' }],
    },
    DashboardPublishOptions: { AdHocFilteringOption: { AvailabilityStatus: 'DISABLED' } },
  }));

  fake.calls.length = 0;
}

/**
 * Bundle of both roots, passed through serialization like a bundle read from disk
 */
export async function exportSourceBundle(source: FakeQuickSight): Promise<AssetBundle> {
  const orchestrator = new AssetExportOrchestrator(source.client, {
    awsAccountId: source.accountId,
    region: source.region,
    namespace: 'default',
    includePermissions: true,
    includeTags: true,
  });
  const { bundle } = await orchestrator.exportBundle({
    analysisIds: ['sales-analysis'],
    dashboardIds: ['sales-dashboard'],
  });
  return parseBundle(serializeBundle(bundle));
}

export function importOptions(overrides: Partial<ImportOptions> = {}): ImportOptions {
  return {
    ...DEFAULT_IMPORT_OPTIONS,
    wait: { pollInterval: 0, maxPolls: 5 },
    retry: { maxRetries: 2, baseDelay: 0, maxDelay: 0 },
    ...overrides,
  };
}
