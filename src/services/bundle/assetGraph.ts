import { ASSET_KINDS, AssetKey, AssetKind, assetKey } from '../../types';
import { DependencyCycleError, UnresolvedDependencyError, ValidationError } from '../../utils/errors';

export interface GraphNode {
  kind: AssetKind;
  id: string;
  dependencies: AssetKey[];
}

/**
 * Order assets so that every asset follows all of its dependencies.
 * Among assets that are ready at the same time, kind order
 * (data source, theme, dataset, analysis, dashboard) wins, then input order.
 */
export function sortAssets<T extends GraphNode>(assets: T[]): T[] {
  const entries = new Map<AssetKey, { asset: T; index: number; pending: Set<AssetKey> }>();

  assets.forEach((asset, index) => {
    const key = assetKey(asset.kind, asset.id);
    if (entries.has(key)) {
      throw new ValidationError(`Asset ${key} appears more than once`);
    }
    entries.set(key, { asset, index, pending: new Set(asset.dependencies) });
  });

  for (const [key, entry] of entries) {
    for (const dependency of entry.pending) {
      if (!entries.has(dependency)) {
        throw new UnresolvedDependencyError(dependency, key);
      }
    }
  }

  const rank = (kind: AssetKind) => ASSET_KINDS.indexOf(kind);
  const sorted: T[] = [];

  while (entries.size > 0) {
    let next: AssetKey | undefined;
    for (const [key, entry] of entries) {
      if (entry.pending.size > 0) continue;
      const current = next === undefined ? undefined : entries.get(next);
      if (!current
        || rank(entry.asset.kind) < rank(current.asset.kind)
        || (rank(entry.asset.kind) === rank(current.asset.kind) && entry.index < current.index)) {
        next = key;
      }
    }

    if (next === undefined) {
      throw new DependencyCycleError([...entries.keys()]);
    }

    const chosen = entries.get(next);
    entries.delete(next);
    if (chosen) {
      sorted.push(chosen.asset);
    }
    for (const entry of entries.values()) {
      entry.pending.delete(next);
    }
  }

  return sorted;
}
