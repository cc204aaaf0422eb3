import { QuickSightClient } from '@aws-sdk/client-quicksight';
import { PermissionsService } from '../permissions.service';
import { TagService } from '../tag.service';
import { AssetBundle, AssetKind, BundleAsset } from '../../types';
import { buildQuickSightArn } from '../../utils/arn';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';

import { IAssetImporter } from './core/interfaces';
import {
  ImportContext,
  ImportOptions,
  ImportResult,
  ImportTarget,
  ImportedAsset,
  PlannedAsset,
} from './core/types';
import { IdentifierMap } from './identifierMap';
import { planImport } from './importPlan';
import { AnalysisImporter } from './importers/AnalysisImporter';
import { DashboardImporter } from './importers/DashboardImporter';
import { DatasetImporter } from './importers/DatasetImporter';
import { DatasourceImporter } from './importers/DatasourceImporter';
import { ThemeImporter } from './importers/ThemeImporter';

/**
 * Import pipeline: plans the bundle, then creates or updates one asset at a
 * time in dependency order. The first failure stops the run.
 */
export class AssetImportOrchestrator {
  constructor(
    private readonly client: QuickSightClient,
    private readonly target: ImportTarget,
    private readonly options: ImportOptions,
  ) {}

  private initializeImporters(context: ImportContext): Map<AssetKind, IAssetImporter> {
    const permissionsService = new PermissionsService(this.client, context.awsAccountId);
    const tagService = new TagService(this.client);

    const importers: IAssetImporter[] = [
      new DatasourceImporter(this.client, permissionsService, tagService, context),
      new ThemeImporter(this.client, permissionsService, tagService, context),
      new DatasetImporter(this.client, permissionsService, tagService, context),
      new AnalysisImporter(this.client, permissionsService, tagService, context),
      new DashboardImporter(this.client, permissionsService, tagService, context),
    ];

    return new Map<AssetKind, IAssetImporter>(importers.map(importer => [importer.kind, importer]));
  }

  async importBundle(bundle: AssetBundle): Promise<ImportResult> {
    const startTime = Date.now();
    const plan = planImport(bundle, this.options);
    const { awsAccountId, region } = this.target;

    logger.info(`Importing ${plan.length} assets from account ${bundle.manifest.sourceAccountId} into ${awsAccountId}`);

    const assets = this.options.dryRun
      ? plan.map(planned => this.describePlanned(planned))
      : await this.execute(plan, {
        awsAccountId,
        region,
        options: this.options,
        source: bundle.manifest,
        identifiers: new IdentifierMap(),
      });

    const duration = Date.now() - startTime;
    logger.info(`${this.options.dryRun ? 'Planned' : 'Imported'} ${assets.length} assets`, { duration });

    return {
      targetAccountId: awsAccountId,
      region,
      dryRun: this.options.dryRun,
      assets,
      duration,
    };
  }

  private async execute(plan: PlannedAsset[], context: ImportContext): Promise<ImportedAsset[]> {
    const importers = this.initializeImporters(context);
    const imported: ImportedAsset[] = [];

    for (const planned of plan) {
      const importer = importers.get(planned.asset.kind);
      if (!importer) {
        throw new ValidationError(`No importer for ${planned.asset.kind} assets`);
      }
      imported.push(await importer.importAsset(planned));
    }

    return imported;
  }

  private describePlanned({ asset, targetId, targetName }: PlannedAsset<BundleAsset>): ImportedAsset {
    return {
      kind: asset.kind,
      sourceId: asset.id,
      targetId,
      name: targetName,
      arn: buildQuickSightArn(this.target.region, this.target.awsAccountId, asset.kind, targetId),
      action: 'planned',
    };
  }
}
