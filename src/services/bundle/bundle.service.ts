import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { format } from 'date-fns';
import { AssetBundle, AssetBundleSchema } from './bundle.schema';
import { reviveTimestamps } from './timestamps';
import { getErrorFields } from '../../utils/awsRetry';
import { BundleValidationError, ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export interface BundleStore {
  read(location: string): Promise<string>;
  write(location: string, content: string): Promise<void>;
}

export function isS3Location(location: string): boolean {
  return location.startsWith('s3://');
}

export function parseS3Location(location: string): { bucket: string; key: string } {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(location);
  if (!match) {
    throw new ValidationError(`Invalid S3 location ${location}, expected s3://bucket/key`);
  }
  return { bucket: match[1], key: match[2] };
}

export class LocalBundleStore implements BundleStore {
  async read(location: string): Promise<string> {
    try {
      return await readFile(location, 'utf8');
    } catch (error) {
      if (getErrorFields(error).code === 'ENOENT') {
        throw new ValidationError(`Bundle file ${location} does not exist`, { cause: error });
      }
      throw error;
    }
  }

  async write(location: string, content: string): Promise<void> {
    await mkdir(path.dirname(location), { recursive: true });
    await writeFile(location, content, 'utf8');
  }
}

export class S3BundleStore implements BundleStore {
  constructor(private readonly s3Client: S3Client) {}

  async read(location: string): Promise<string> {
    const { bucket, key } = parseS3Location(location);
    const response = await this.s3Client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new ValidationError(`Bundle ${location} is empty`);
    }
    return response.Body.transformToString('utf-8');
  }

  async write(location: string, content: string): Promise<void> {
    const { bucket, key } = parseS3Location(location);
    await this.s3Client.send(new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: content,
      ContentType: 'application/json',
    }));
  }
}

export function serializeBundle(bundle: AssetBundle): string {
  return JSON.stringify(bundle, null, 2);
}

export function parseBundle(content: string): AssetBundle {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new BundleValidationError([`not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }

  const result = AssetBundleSchema.safeParse(raw);
  if (!result.success) {
    throw new BundleValidationError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  for (const asset of result.data.assets) {
    reviveTimestamps(asset.definition);
  }
  return result.data;
}

/**
 * Where to write a bundle: `output` itself when it names a .json file,
 * otherwise a file inside the `output` directory or S3 prefix.
 */
export function resolveOutputLocation(output: string, rootIds: string[], now: Date = new Date()): string {
  if (output.endsWith('.json')) {
    return output;
  }

  const fileName = rootIds.length === 1
    ? `${rootIds[0]}.json`
    : `bundle-${format(now, "yyyyMMdd'T'HHmmss")}.json`;

  if (isS3Location(output)) {
    return `${output.replace(/\/+$/, '')}/${fileName}`;
  }
  return path.join(output, fileName);
}

export class BundleService {
  private s3Store: S3BundleStore | null = null;

  constructor(
    private readonly createS3Client: () => S3Client,
    private readonly localStore: BundleStore = new LocalBundleStore(),
  ) {}

  private storeFor(location: string): BundleStore {
    if (!isS3Location(location)) {
      return this.localStore;
    }
    if (!this.s3Store) {
      this.s3Store = new S3BundleStore(this.createS3Client());
    }
    return this.s3Store;
  }

  async save(bundle: AssetBundle, location: string): Promise<void> {
    await this.storeFor(location).write(location, serializeBundle(bundle));
    logger.info(`Wrote bundle with ${bundle.assets.length} assets to ${location}`);
  }

  async load(location: string): Promise<AssetBundle> {
    const content = await this.storeFor(location).read(location);
    const bundle = parseBundle(content);
    logger.debug(`Read bundle with ${bundle.assets.length} assets from ${location}`, {
      sourceAccountId: bundle.manifest.sourceAccountId,
      exportedAt: bundle.manifest.exportedAt,
    });
    return bundle;
  }
}
