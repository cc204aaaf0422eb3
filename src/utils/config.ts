import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { DataSourceCredentials } from '@aws-sdk/client-quicksight';
import { DEFAULT_REGION, InstanceConfig } from './awsConfig';
import { ValidationError } from './errors';
import { DEFAULT_IMPORT_OPTIONS, ImportOptions, isConflictPolicy } from '../services/import/core/types';

type Env = Record<string, string | undefined>;

export interface SharedCliOptions {
  region?: string;
  accountId?: string;
  verbose?: boolean;
}

export interface ExportCliOptions extends SharedCliOptions {
  source?: string;
  analysis?: string[];
  dashboard?: string[];
  analysisName?: string[];
  dashboardName?: string[];
  namespace?: string;
  output: string;
  permissions: boolean;
  tags: boolean;
}

export interface ImportCliOptions extends SharedCliOptions {
  target?: string;
  onConflict?: string;
  overwrite?: boolean;
  idSuffix?: string;
  nameSuffix?: string;
  namespace?: string;
  identityRegion?: string;
  permissions: boolean;
  grant?: string[];
  tags: boolean;
  publishAnalyses?: boolean;
  credentials?: string;
  allowSchemaChanges?: boolean;
  dryRun?: boolean;
}

const CredentialsFileSchema = z.record(
  z.string(),
  z.object({
    CredentialPair: z.object({
      Username: z.string(),
      Password: z.string(),
    }).optional(),
    CopySourceArn: z.string().optional(),
    SecretArn: z.string().optional(),
  }).refine(
    credentials => Boolean(credentials.CredentialPair || credentials.CopySourceArn || credentials.SecretArn),
    { message: 'needs one of CredentialPair, CopySourceArn or SecretArn' },
  ),
);

/**
 * Flags win over the environment; without a profile the default credential chain is used
 */
export function resolveInstance(profile: string | undefined, options: SharedCliOptions, env: Env = process.env): InstanceConfig {
  return {
    profile: profile || env.AWS_PROFILE || undefined,
    region: options.region || env.AWS_REGION || DEFAULT_REGION,
    accountId: options.accountId || env.AWS_ACCOUNT_ID || undefined,
  };
}

export function resolveNamespace(option: string | undefined, env: Env = process.env): string {
  return option || env.QSS_NAMESPACE || 'default';
}

/**
 * Data source credentials, keyed by source data source id
 */
export async function loadCredentialsFile(location: string): Promise<Record<string, DataSourceCredentials>> {
  const content = await readFile(location, 'utf8').catch((error: unknown) => {
    throw new ValidationError(`Cannot read credentials file ${location}`, { cause: error });
  });

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Credentials file ${location} is not valid JSON`, { cause: error });
  }

  const result = CredentialsFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid credentials file ${location}: ${issues.join('; ')}`);
  }
  return result.data;
}

export async function resolveImportOptions(options: ImportCliOptions, env: Env = process.env): Promise<ImportOptions> {
  const conflictPolicy = options.overwrite ? 'overwrite' : options.onConflict ?? DEFAULT_IMPORT_OPTIONS.conflictPolicy;
  if (!isConflictPolicy(conflictPolicy)) {
    throw new ValidationError(`Unknown conflict policy "${conflictPolicy}", expected fail, overwrite or skip`);
  }

  return {
    ...DEFAULT_IMPORT_OPTIONS,
    conflictPolicy,
    idSuffix: options.idSuffix ?? env.QSS_ID_SUFFIX ?? DEFAULT_IMPORT_OPTIONS.idSuffix,
    nameSuffix: options.nameSuffix ?? env.QSS_NAME_SUFFIX ?? DEFAULT_IMPORT_OPTIONS.nameSuffix,
    namespace: resolveNamespace(options.namespace, env),
    identityRegion: options.identityRegion,
    permissionPolicy: options.permissions ? 'copy' : 'none',
    grantPrincipals: options.grant ?? [],
    copyTags: options.tags,
    publishAnalyses: Boolean(options.publishAnalyses),
    dataSourceCredentials: options.credentials ? await loadCredentialsFile(options.credentials) : {},
    allowSchemaChanges: Boolean(options.allowSchemaChanges),
    dryRun: Boolean(options.dryRun),
  };
}
