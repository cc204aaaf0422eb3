import type { DataSourceCredentials } from '@aws-sdk/client-quicksight';
import { AssetKind, BundleAsset, BundleManifest } from '../../../types';
import { RetryOptions } from '../../../utils/awsRetry';
import { IdentifierMap } from '../identifierMap';

export type ConflictPolicy = 'fail' | 'overwrite' | 'skip';

export const CONFLICT_POLICIES: readonly ConflictPolicy[] = ['fail', 'overwrite', 'skip'];

export function isConflictPolicy(value: string): value is ConflictPolicy {
  return CONFLICT_POLICIES.some(policy => policy === value);
}

export type PermissionPolicy = 'copy' | 'none';

export interface WaitOptions {
  pollInterval: number;
  maxPolls: number;
}

export interface ImportOptions {
  conflictPolicy: ConflictPolicy;
  idSuffix: string;
  nameSuffix: string;
  /** Namespace of the target users and groups */
  namespace: string;
  /** Region holding the target QuickSight identities; defaults to each principal's own region */
  identityRegion?: string;
  permissionPolicy: PermissionPolicy;
  grantPrincipals: string[];
  copyTags: boolean;
  /** Publish every imported analysis as `<analysis target id>_dashboard` */
  publishAnalyses: boolean;
  /** Keyed by source data source id */
  dataSourceCredentials: Record<string, DataSourceCredentials>;
  allowSchemaChanges: boolean;
  dryRun: boolean;
  wait: WaitOptions;
  retry?: RetryOptions;
}

export const DEFAULT_IMPORT_OPTIONS: ImportOptions = {
  conflictPolicy: 'fail',
  idSuffix: '',
  nameSuffix: '',
  namespace: 'default',
  permissionPolicy: 'copy',
  grantPrincipals: [],
  copyTags: true,
  publishAnalyses: false,
  dataSourceCredentials: {},
  allowSchemaChanges: false,
  dryRun: false,
  wait: {
    pollInterval: 2000,
    maxPolls: 90,
  },
};

export interface ImportTarget {
  awsAccountId: string;
  region: string;
}

export interface ImportContext extends ImportTarget {
  options: ImportOptions;
  source: BundleManifest;
  identifiers: IdentifierMap;
}

export interface PlannedAsset<A extends BundleAsset = BundleAsset> {
  asset: A;
  targetId: string;
  targetName: string;
}

export type ImportAction = 'created' | 'updated' | 'skipped' | 'planned';

export interface ImportedAsset {
  kind: AssetKind;
  sourceId: string;
  targetId: string;
  name: string;
  arn: string;
  action: ImportAction;
  version?: number;
  ingestionId?: string;
}

export interface ImportResult {
  targetAccountId: string;
  region: string;
  dryRun: boolean;
  assets: ImportedAsset[];
  duration: number;
}
