import { QuickSightClient } from '@aws-sdk/client-quicksight';
import { formatISO } from 'date-fns';
import { PermissionsService } from '../permissions.service';
import { TagService } from '../tag.service';
import { AssetSearchService } from '../assetSearch.service';
import { sortAssets } from '../bundle/assetGraph';
import { BUNDLE_FORMAT_VERSION } from '../bundle/bundle.schema';
import {
  AssetKey,
  AssetKind,
  BundleAsset,
  assetKey,
  emptyKindCounts,
  parseAssetKey,
} from '../../types';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';

import { IAssetProcessor } from './core/interfaces';
import { ExportContext, ExportRequest, ExportResult } from './core/types';
import { AnalysisProcessor } from './processors/AnalysisProcessor';
import { DashboardProcessor } from './processors/DashboardProcessor';
import { DatasetProcessor } from './processors/DatasetProcessor';
import { DatasourceProcessor } from './processors/DatasourceProcessor';
import { ThemeProcessor } from './processors/ThemeProcessor';

/**
 * Export pipeline: resolves the requested analyses and dashboards, walks their
 * dependency closure one asset at a time and assembles the bundle.
 */
export class AssetExportOrchestrator {
  private processors: Map<AssetKind, IAssetProcessor>;
  private searchService: AssetSearchService;

  constructor(
    private readonly client: QuickSightClient,
    private readonly context: ExportContext,
  ) {
    this.searchService = new AssetSearchService(client, context.awsAccountId);
    this.processors = new Map();
    this.initializeProcessors();
  }

  private initializeProcessors(): void {
    const permissionsService = new PermissionsService(this.client, this.context.awsAccountId);
    const tagService = new TagService(this.client);

    const processors: IAssetProcessor[] = [
      new AnalysisProcessor(this.client, permissionsService, tagService, this.context),
      new DashboardProcessor(this.client, permissionsService, tagService, this.context),
      new DatasetProcessor(this.client, permissionsService, tagService, this.context),
      new DatasourceProcessor(this.client, permissionsService, tagService, this.context),
      new ThemeProcessor(this.client, permissionsService, tagService, this.context),
    ];

    for (const processor of processors) {
      this.processors.set(processor.kind, processor);
    }
  }

  async resolveRoots(request: ExportRequest): Promise<AssetKey[]> {
    const roots: AssetKey[] = [];
    const add = (key: AssetKey) => {
      if (!roots.includes(key)) {
        roots.push(key);
      }
    };

    for (const id of request.analysisIds || []) {
      add(assetKey('analysis', id));
    }
    for (const id of request.dashboardIds || []) {
      add(assetKey('dashboard', id));
    }
    for (const name of request.analysisNames || []) {
      add(assetKey('analysis', await this.searchService.findAnalysisId(name)));
    }
    for (const name of request.dashboardNames || []) {
      add(assetKey('dashboard', await this.searchService.findDashboardId(name)));
    }

    if (roots.length === 0) {
      throw new ValidationError('Nothing to export: give at least one analysis or dashboard');
    }
    return roots;
  }

  async exportBundle(request: ExportRequest): Promise<ExportResult> {
    const startTime = Date.now();
    const rootAssets = await this.resolveRoots(request);

    logger.info(`Exporting ${rootAssets.join(', ')} from account ${this.context.awsAccountId}`);

    const collected = new Map<AssetKey, BundleAsset>();
    const queue: AssetKey[] = [...rootAssets];

    // Breadth-first over the dependency closure, each asset described once
    for (let index = 0; index < queue.length; index++) {
      const key = queue[index];
      const { kind, id } = parseAssetKey(key);
      const processor = this.processors.get(kind);
      if (!processor) {
        throw new ValidationError(`No exporter for ${kind} assets`);
      }

      logger.info(`Exporting ${kind} ${id}`, { kind, assetId: id });
      const asset = await processor.exportAsset(id);
      collected.set(key, asset);

      for (const dependency of asset.dependencies) {
        if (!queue.includes(dependency)) {
          queue.push(dependency);
        }
      }
    }

    const assets = sortAssets([...collected.values()]);
    const counts = emptyKindCounts();
    for (const asset of assets) {
      counts[asset.kind]++;
    }

    const duration = Date.now() - startTime;
    logger.info(`Exported ${assets.length} assets`, { duration });

    return {
      bundle: {
        manifest: {
          formatVersion: BUNDLE_FORMAT_VERSION,
          sourceAccountId: this.context.awsAccountId,
          sourceRegion: this.context.region,
          namespace: this.context.namespace,
          exportedAt: formatISO(new Date()),
          rootAssets,
        },
        assets,
      },
      rootAssets,
      counts,
      duration,
    };
  }
}
