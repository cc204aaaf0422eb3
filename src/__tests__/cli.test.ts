import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { S3Client } from '@aws-sdk/client-s3';
import { createProgram } from '../cli';
import { parseBundle } from '../services/bundle/bundle.service';
import { CliDependencies } from '../commands/dependencies';
import { FakeQuickSight } from '../services/__tests__/helpers/fakeQuickSight';
import { SOURCE_ACCOUNT, TARGET_ACCOUNT, seedSourceAccount } from '../services/__tests__/helpers/fixtures';
import { InstanceConfig } from '../utils/awsConfig';

describe('qss CLI', () => {
  let source: FakeQuickSight;
  let target: FakeQuickSight;
  let output: string[];
  let directory: string;
  let deps: CliDependencies;

  const accountFor = (instance: InstanceConfig) => (instance.profile === 'target' ? target : source);

  const run = async (...args: string[]) => {
    await createProgram(deps).parseAsync(['node', 'qss', ...args]);
  };

  beforeEach(async () => {
    source = new FakeQuickSight(SOURCE_ACCOUNT);
    target = new FakeQuickSight(TARGET_ACCOUNT);
    await seedSourceAccount(source);

    output = [];
    directory = await mkdtemp(path.join(os.tmpdir(), 'qss-cli-'));
    deps = {
      createQuickSightClient: instance => accountFor(instance).client,
      createS3Client: instance => new S3Client({ region: instance.region }),
      resolveAccountId: async instance => accountFor(instance).accountId,
      print: line => output.push(line),
    };
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(directory, { recursive: true, force: true });
  });

  it('should export a dashboard into a file named after it', async () => {
    await run('export', '--source', 'source', '-d', 'sales-dashboard', '-o', directory);

    const bundle = parseBundle(await readFile(path.join(directory, 'sales-dashboard.json'), 'utf8'));

    expect(process.exitCode).toBeUndefined();
    expect(bundle.manifest.rootAssets).toEqual(['dashboard/sales-dashboard']);
    expect(output).toEqual([
      `Exported 4 assets (1 datasource, 2 dataset, 1 dashboard) to ${path.join(directory, 'sales-dashboard.json')}`,
    ]);
  });

  it('should record the source namespace in the manifest', async () => {
    const file = path.join(directory, 'finance.json');

    await run('export', '--source', 'source', '-d', 'sales-dashboard', '--namespace', 'finance', '-o', file);

    expect(parseBundle(await readFile(file, 'utf8')).manifest.namespace).toBe('finance');
  });

  it('should import an exported bundle into another account', async () => {
    const file = path.join(directory, 'sales.json');
    await run('get', '--source', 'source', '-d', 'sales-dashboard', '-o', file);
    output = [];

    await run('put', file, '--target', 'target');

    expect(process.exitCode).toBeUndefined();
    expect(output).toEqual([
      'created  datasource sales-db -> sales-db',
      'created  dataset    regions-rls -> regions-rls',
      'created  dataset    orders -> orders',
      'created  dashboard  sales-dashboard -> sales-dashboard (version 1)',
      `Imported 4 assets into account ${TARGET_ACCOUNT} (us-east-1)`,
    ]);
    expect(target.dashboards.get('sales-dashboard')?.publishedVersion).toBe(1);
  });

  it('should only plan on a dry run', async () => {
    const file = path.join(directory, 'sales.json');
    await run('export', '--source', 'source', '-d', 'sales-dashboard', '-o', file);
    output = [];

    await run('import', file, '--target', 'target', '--dry-run', '--id-suffix', '-copy');

    expect(output[0]).toBe('planned  datasource sales-db -> sales-db-copy');
    expect(output[4]).toBe(`Planned 4 assets into account ${TARGET_ACCOUNT} (us-east-1)`);
    expect(target.dataSources.size).toBe(0);
  });

  it('should exit with 1 when the target already has the assets', async () => {
    const file = path.join(directory, 'sales.json');
    await run('export', '--source', 'source', '-d', 'sales-dashboard', '-o', file);
    await run('import', file, '--target', 'target');
    output = [];

    await run('import', file, '--target', 'target');

    expect(process.exitCode).toBe(1);
    expect(output).toEqual([
      'Error: datasource sales-db already exists in the target account; use --overwrite or --on-conflict skip',
    ]);
  });

  it('should exit with 1 on a missing bundle', async () => {
    const file = path.join(directory, 'missing.json');

    await run('import', file, '--target', 'target');

    expect(process.exitCode).toBe(1);
    expect(output).toEqual([`Error: Bundle file ${file} does not exist`]);
  });

  it('should exit with 1 on an unknown conflict policy', async () => {
    const file = path.join(directory, 'sales.json');
    await run('export', '--source', 'source', '-d', 'sales-dashboard', '-o', file);
    output = [];

    await run('import', file, '--target', 'target', '--on-conflict', 'merge');

    expect(process.exitCode).toBe(1);
    expect(output).toEqual(['Error: Unknown conflict policy "merge", expected fail, overwrite or skip']);
  });

  it('should exit with 1 when nothing is requested', async () => {
    await run('export', '--source', 'source', '-o', directory);

    expect(process.exitCode).toBe(1);
    expect(output).toEqual(['Error: Nothing to export: give at least one analysis or dashboard']);
  });
});
