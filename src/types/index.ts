import { ValidationError } from '../utils/errors';

export type AssetKind = 'datasource' | 'theme' | 'dataset' | 'analysis' | 'dashboard';

/**
 * Kinds in creation order: an asset only ever depends on kinds listed before it
 * (datasets may also depend on other datasets).
 */
export const ASSET_KINDS: readonly AssetKind[] = ['datasource', 'theme', 'dataset', 'analysis', 'dashboard'];

export function isAssetKind(value: string): value is AssetKind {
  return ASSET_KINDS.some(kind => kind === value);
}

/**
 * `<kind>/<id>`, unique within a bundle. Mirrors the resource part of a QuickSight ARN.
 */
export type AssetKey = string;

export function assetKey(kind: AssetKind, id: string): AssetKey {
  return `${kind}/${id}`;
}

export function parseAssetKey(key: AssetKey): { kind: AssetKind; id: string } {
  const slash = key.indexOf('/');
  const kind = slash === -1 ? '' : key.slice(0, slash);
  const id = key.slice(slash + 1);
  if (!isAssetKind(kind) || !id) {
    throw new ValidationError(`Invalid asset key: ${key}`);
  }
  return { kind, id };
}

export type KindCounts = Record<AssetKind, number>;

export function emptyKindCounts(): KindCounts {
  return { datasource: 0, theme: 0, dataset: 0, analysis: 0, dashboard: 0 };
}

export type {
  AssetBundle,
  BundleManifest,
  BundleAsset,
  AssetOfKind,
  DataSourceAsset,
  ThemeAsset,
  DataSetAsset,
  AnalysisAsset,
  DashboardAsset,
  DataSetDefinition,
} from '../services/bundle/bundle.schema';
