import { Command } from 'commander';
import { AssetExportOrchestrator } from '../services/export/AssetExportOrchestrator';
import { ExportResult } from '../services/export/core/types';
import { BundleService, resolveOutputLocation } from '../services/bundle/bundle.service';
import { ASSET_KINDS, parseAssetKey } from '../types';
import { describeInstance } from '../utils/awsConfig';
import { ExportCliOptions, resolveInstance, resolveNamespace } from '../utils/config';
import { logger } from '../utils/logger';
import { CliDependencies } from './dependencies';

export interface ExportCommandResult extends ExportResult {
  location: string;
}

export async function runExport(options: ExportCliOptions, deps: CliDependencies): Promise<ExportCommandResult> {
  const instance = resolveInstance(options.source, options);
  const awsAccountId = await deps.resolveAccountId(instance);

  logger.info(`Exporting from ${describeInstance(instance)}, account ${awsAccountId}`);

  const orchestrator = new AssetExportOrchestrator(deps.createQuickSightClient(instance), {
    awsAccountId,
    region: instance.region,
    namespace: resolveNamespace(options.namespace),
    includePermissions: options.permissions,
    includeTags: options.tags,
  });

  const result = await orchestrator.exportBundle({
    analysisIds: options.analysis,
    dashboardIds: options.dashboard,
    analysisNames: options.analysisName,
    dashboardNames: options.dashboardName,
  });

  const location = resolveOutputLocation(options.output, result.rootAssets.map(key => parseAssetKey(key).id));
  await new BundleService(() => deps.createS3Client(instance)).save(result.bundle, location);

  return { ...result, location };
}

export function printExportSummary(result: ExportCommandResult, deps: CliDependencies): void {
  const counts = ASSET_KINDS
    .filter(kind => result.counts[kind] > 0)
    .map(kind => `${result.counts[kind]} ${kind}`);
  deps.print(`Exported ${result.bundle.assets.length} assets (${counts.join(', ')}) to ${result.location}`);
}

export function registerExportCommand(program: Command, deps: CliDependencies, handle: (action: () => Promise<void>) => Promise<void>): void {
  program
    .command('export')
    .alias('get')
    .description('Export analyses and dashboards with their datasets, data sources and themes into a bundle')
    .option('--source <instance>', 'AWS profile of the source account')
    .option('-a, --analysis <ids...>', 'analysis ids')
    .option('-d, --dashboard <ids...>', 'dashboard ids')
    .option('--analysis-name <names...>', 'analysis names')
    .option('--dashboard-name <names...>', 'dashboard names')
    .option('--namespace <namespace>', 'QuickSight namespace of the source users and groups (default QSS_NAMESPACE or default)')
    .option('-o, --output <path>', 'directory, .json file or s3:// location', '.')
    .option('--no-permissions', 'do not export permissions')
    .option('--no-tags', 'do not export tags')
    .action((_options: unknown, command: Command) => handle(async () => {
      const result = await runExport(command.optsWithGlobals<ExportCliOptions>(), deps);
      printExportSummary(result, deps);
    }));
}
