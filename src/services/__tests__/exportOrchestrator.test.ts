import { AccessDeniedException, CreateAnalysisCommand } from '@aws-sdk/client-quicksight';
import { AssetExportOrchestrator } from '../export/AssetExportOrchestrator';
import { ExportContext } from '../export/core/types';
import { assetKey } from '../../types';
import { AmbiguousAssetError, AssetNotFoundError, UnsupportedAssetError, ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { FakeQuickSight } from './helpers/fakeQuickSight';
import { REGION, SOURCE_ACCOUNT, seedSourceAccount, userArn } from './helpers/fixtures';

describe('AssetExportOrchestrator', () => {
  let source: FakeQuickSight;
  let context: ExportContext;

  beforeEach(async () => {
    source = new FakeQuickSight(SOURCE_ACCOUNT, REGION);
    await seedSourceAccount(source);
    context = {
      awsAccountId: SOURCE_ACCOUNT,
      region: REGION,
      namespace: 'default',
      includePermissions: true,
      includeTags: true,
      retry: { maxRetries: 3, baseDelay: 0, maxDelay: 0 },
    };
  });

  it('should export the dependency closure with dependencies first', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const result = await orchestrator.exportBundle({
      analysisIds: ['sales-analysis'],
      dashboardIds: ['sales-dashboard'],
    });

    expect(result.bundle.assets.map(asset => assetKey(asset.kind, asset.id))).toEqual([
      'datasource/sales-db',
      'theme/brand-theme',
      'dataset/regions-rls',
      'dataset/orders',
      'analysis/sales-analysis',
      'dashboard/sales-dashboard',
    ]);
    expect(result.counts).toEqual({ datasource: 1, theme: 1, dataset: 2, analysis: 1, dashboard: 1 });
    expect(result.rootAssets).toEqual(['analysis/sales-analysis', 'dashboard/sales-dashboard']);
  });

  it('should describe a shared dependency only once', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    await orchestrator.exportBundle({ analysisIds: ['sales-analysis'], dashboardIds: ['sales-dashboard'] });

    expect(source.callsOf('DescribeDataSourceCommand')).toBe(1);
    expect(source.callsOf('DescribeDataSetCommand')).toBe(2);
    expect(source.callsOf('DescribeThemeCommand')).toBe(1);
  });

  it('should record dependencies of every asset', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const { bundle } = await orchestrator.exportBundle({ dashboardIds: ['sales-dashboard'] });
    const dependencies = Object.fromEntries(bundle.assets.map(asset => [assetKey(asset.kind, asset.id), asset.dependencies]));

    expect(dependencies).toEqual({
      'datasource/sales-db': [],
      'dataset/regions-rls': ['datasource/sales-db'],
      'dataset/orders': ['datasource/sales-db', 'dataset/regions-rls'],
      'dashboard/sales-dashboard': ['dataset/orders'],
    });
  });

  it('should fill in the manifest', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const { bundle } = await orchestrator.exportBundle({ dashboardIds: ['sales-dashboard'] });

    expect(bundle.manifest).toEqual({
      formatVersion: 1,
      sourceAccountId: SOURCE_ACCOUNT,
      sourceRegion: REGION,
      namespace: 'default',
      exportedAt: expect.any(String),
      rootAssets: ['dashboard/sales-dashboard'],
    });
  });

  it('should leave data source credentials out of the bundle', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const { bundle } = await orchestrator.exportBundle({ dashboardIds: ['sales-dashboard'] });
    const dataSource = bundle.assets.find(asset => asset.kind === 'datasource');

    expect(dataSource?.definition).toEqual({
      Type: 'POSTGRESQL',
      DataSourceParameters: {
        PostgreSqlParameters: { Host: 'db.internal', Port: 5432, Database: 'sales' },
      },
      VpcConnectionProperties: {
        VpcConnectionArn: `arn:aws:quicksight:${REGION}:${SOURCE_ACCOUNT}:vpcConnection/vpc-1`,
      },
    });
  });

  it('should carry permissions and tags', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const { bundle } = await orchestrator.exportBundle({ analysisIds: ['sales-analysis'] });
    const analysis = bundle.assets.find(asset => asset.kind === 'analysis');

    expect(analysis?.permissions).toEqual([
      { Principal: userArn(SOURCE_ACCOUNT, 'alice'), Actions: ['quicksight:DescribeAnalysis', 'quicksight:UpdateAnalysis'] },
    ]);
    expect(analysis?.tags).toEqual([{ Key: 'team', Value: 'analytics' }]);
  });

  it('should skip permissions and tags when disabled', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, {
      ...context,
      includePermissions: false,
      includeTags: false,
    });

    const { bundle } = await orchestrator.exportBundle({ analysisIds: ['sales-analysis'] });

    expect(bundle.assets.every(asset => asset.permissions.length === 0 && asset.tags.length === 0)).toBe(true);
    expect(source.callsOf('DescribeAnalysisPermissionsCommand')).toBe(0);
    expect(source.callsOf('ListTagsForResourceCommand')).toBe(0);
  });

  it('should not export built-in themes', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const { bundle } = await orchestrator.exportBundle({ dashboardIds: ['sales-dashboard'] });

    expect(bundle.assets.some(asset => asset.kind === 'theme')).toBe(false);
    expect(source.callsOf('DescribeThemeCommand')).toBe(0);
  });

  it('should resolve analysis and dashboard names', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const roots = await orchestrator.resolveRoots({
      analysisNames: ['Sales Analysis'],
      dashboardNames: ['Sales Dashboard'],
    });

    expect(roots).toEqual(['analysis/sales-analysis', 'dashboard/sales-dashboard']);
  });

  it('should reject a name shared by several analyses', async () => {
    await source.handle(new CreateAnalysisCommand({
      AwsAccountId: SOURCE_ACCOUNT,
      AnalysisId: 'sales-analysis-copy',
      Name: 'Sales Analysis',
      Definition: { DataSetIdentifierDeclarations: [] },
    }));
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    await expect(orchestrator.resolveRoots({ analysisNames: ['Sales Analysis'] }))
      .rejects.toThrow(AmbiguousAssetError);
  });

  it('should report a missing asset', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    await expect(orchestrator.exportBundle({ analysisIds: ['missing'] }))
      .rejects.toThrow(new AssetNotFoundError('analysis', 'missing', 'analysis missing does not exist'));
  });

  it('should reject an empty request', async () => {
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    await expect(orchestrator.exportBundle({})).rejects.toThrow(ValidationError);
  });

  it('should retry throttled describe calls', async () => {
    source.throttle('DescribeDataSetCommand', 2);
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const { bundle } = await orchestrator.exportBundle({ dashboardIds: ['sales-dashboard'] });

    expect(bundle.assets).toHaveLength(4);
    expect(source.callsOf('DescribeDataSetCommand')).toBe(4);
  });

  it('should export without permissions it cannot read', async () => {
    const warn = jest.spyOn(logger, 'warn');
    source.failWith('DescribeAnalysisPermissionsCommand', new AccessDeniedException({ $metadata: {}, message: 'not allowed' }));
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const { bundle } = await orchestrator.exportBundle({ analysisIds: ['sales-analysis'] });
    const analysis = bundle.assets.find(asset => asset.kind === 'analysis');

    expect(analysis?.permissions).toEqual([]);
    expect(analysis?.tags).toEqual([{ Key: 'team', Value: 'analytics' }]);
    expect(source.callsOf('DescribeAnalysisPermissionsCommand')).toBe(1);
    expect(warn).toHaveBeenCalledWith('Failed to get permissions for analysis sales-analysis: not allowed');
    warn.mockRestore();
  });

  it('should export without tags it cannot read', async () => {
    source.failWith('ListTagsForResourceCommand', new AccessDeniedException({ $metadata: {}, message: 'not allowed' }));
    const orchestrator = new AssetExportOrchestrator(source.client, context);

    const { bundle } = await orchestrator.exportBundle({ dashboardIds: ['sales-dashboard'] });

    expect(bundle.assets.every(asset => asset.tags.length === 0)).toBe(true);
    expect(bundle.assets).toHaveLength(4);
  });

  describe('unsupported assets', () => {
    it('should reject uploaded file datasets', async () => {
      const orders = source.dataSets.get('orders');
      source.dataSets.set('orders', { ...orders, PhysicalTableMap: undefined });
      const orchestrator = new AssetExportOrchestrator(source.client, context);

      await expect(orchestrator.exportBundle({ dashboardIds: ['sales-dashboard'] })).rejects.toThrow(
        new UnsupportedAssetError('Dataset orders has no physical tables (uploaded file datasets cannot be synchronized)'),
      );
    });

    it('should reject data sources without a type', async () => {
      const dataSource = source.dataSources.get('sales-db');
      source.dataSources.set('sales-db', { ...dataSource, Type: undefined });
      const orchestrator = new AssetExportOrchestrator(source.client, context);

      await expect(orchestrator.exportBundle({ dashboardIds: ['sales-dashboard'] })).rejects.toThrow(
        new UnsupportedAssetError('Data source sales-db has no type (uploaded file data sources cannot be synchronized)'),
      );
    });

    it('should reject analyses that failed to create', async () => {
      source.failedDefinitions.add('sales-analysis');
      const orchestrator = new AssetExportOrchestrator(source.client, context);

      await expect(orchestrator.exportBundle({ analysisIds: ['sales-analysis'] })).rejects.toThrow(
        new UnsupportedAssetError('Analysis sales-analysis is in state CREATION_FAILED and cannot be exported'),
      );
    });

    it('should reject dashboards that failed to create', async () => {
      source.failedDefinitions.add('sales-dashboard');
      const orchestrator = new AssetExportOrchestrator(source.client, context);

      await expect(orchestrator.exportBundle({ dashboardIds: ['sales-dashboard'] })).rejects.toThrow(
        new UnsupportedAssetError('Dashboard sales-dashboard is in state CREATION_FAILED and cannot be exported'),
      );
    });

    it('should reject starter themes of the account', async () => {
      const theme = source.themes.get('brand-theme');
      if (theme) {
        theme.type = 'QUICKSIGHT';
      }
      const orchestrator = new AssetExportOrchestrator(source.client, context);

      await expect(orchestrator.exportBundle({ analysisIds: ['sales-analysis'] })).rejects.toThrow(
        new UnsupportedAssetError('Theme brand-theme is a QuickSight starter theme'),
      );
    });
  });
});
