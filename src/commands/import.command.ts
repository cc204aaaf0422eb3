import { Command } from 'commander';
import { AssetImportOrchestrator } from '../services/import/AssetImportOrchestrator';
import { ImportResult } from '../services/import/core/types';
import { BundleService } from '../services/bundle/bundle.service';
import { describeInstance } from '../utils/awsConfig';
import { ImportCliOptions, resolveImportOptions, resolveInstance } from '../utils/config';
import { logger } from '../utils/logger';
import { CliDependencies } from './dependencies';

export async function runImport(location: string, options: ImportCliOptions, deps: CliDependencies): Promise<ImportResult> {
  const instance = resolveInstance(options.target, options);
  const importOptions = await resolveImportOptions(options);
  const bundle = await new BundleService(() => deps.createS3Client(instance)).load(location);
  const awsAccountId = await deps.resolveAccountId(instance);

  logger.info(`Importing ${location} into ${describeInstance(instance)}, account ${awsAccountId}`);

  const orchestrator = new AssetImportOrchestrator(
    deps.createQuickSightClient(instance),
    { awsAccountId, region: instance.region },
    importOptions,
  );
  return orchestrator.importBundle(bundle);
}

export function printImportSummary(result: ImportResult, deps: CliDependencies): void {
  for (const asset of result.assets) {
    const version = asset.version === undefined ? '' : ` (version ${asset.version})`;
    deps.print(`${asset.action.padEnd(8)} ${asset.kind.padEnd(10)} ${asset.sourceId} -> ${asset.targetId}${version}`);
  }
  const verb = result.dryRun ? 'Planned' : 'Imported';
  deps.print(`${verb} ${result.assets.length} assets into account ${result.targetAccountId} (${result.region})`);
}

export function registerImportCommand(program: Command, deps: CliDependencies, handle: (action: () => Promise<void>) => Promise<void>): void {
  program
    .command('import')
    .alias('put')
    .description('Create or update the assets of a bundle in the target account')
    .argument('<bundle>', 'bundle file or s3:// location')
    .option('--target <instance>', 'AWS profile of the target account')
    .option('--on-conflict <policy>', 'fail, overwrite or skip when an asset already exists')
    .option('--overwrite', 'same as --on-conflict overwrite')
    .option('--id-suffix <suffix>', 'appended to every asset id')
    .option('--name-suffix <suffix>', 'appended to every asset name')
    .option('--namespace <namespace>', 'QuickSight namespace of the target users and groups')
    .option('--identity-region <region>', 'region of the target QuickSight identities')
    .option('--no-permissions', 'do not copy the exported permissions')
    .option('--grant <principals...>', 'user or group ARNs given owner permissions on every asset')
    .option('--no-tags', 'do not copy the exported tags')
    .option('--publish-analyses', 'publish every analysis as <analysis id>_dashboard')
    .option('--credentials <file>', 'JSON file of data source credentials keyed by source data source id')
    .option('--allow-schema-changes', 'overwrite datasets even when columns are removed or retyped')
    .option('--dry-run', 'show the planned actions without changing anything')
    .action((bundle: string, _options: unknown, command: Command) => handle(async () => {
      const result = await runImport(bundle, command.optsWithGlobals<ImportCliOptions>(), deps);
      printImportSummary(result, deps);
    }));
}
