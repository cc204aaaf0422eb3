import { AssetKey, AssetKind, assetKey, isAssetKind } from '../../types';
import { parseArn } from '../../utils/arn';
import { IdentifierCollisionError, UnresolvedDependencyError } from '../../utils/errors';

export interface MappedIdentifier {
  kind: AssetKind;
  sourceId: string;
  targetId: string;
  targetArn: string;
}

/**
 * Source asset → target asset, filled in as assets are imported. Every
 * reference inside a definition is rewritten through this map, so an asset can
 * only point at assets imported before it.
 */
export class IdentifierMap {
  private bySource = new Map<AssetKey, MappedIdentifier>();
  private byTarget = new Map<AssetKey, AssetKey>();

  register(entry: MappedIdentifier): void {
    const sourceKey = assetKey(entry.kind, entry.sourceId);
    const targetKey = assetKey(entry.kind, entry.targetId);

    const existing = this.bySource.get(sourceKey);
    if (existing && existing.targetId !== entry.targetId) {
      throw new IdentifierCollisionError(`${sourceKey} is already mapped to ${existing.targetId}`);
    }

    const owner = this.byTarget.get(targetKey);
    if (owner && owner !== sourceKey) {
      throw new IdentifierCollisionError(`${owner} and ${sourceKey} both map to ${targetKey}`);
    }

    this.bySource.set(sourceKey, entry);
    this.byTarget.set(targetKey, sourceKey);
  }

  get(kind: AssetKind, sourceId: string): MappedIdentifier | undefined {
    return this.bySource.get(assetKey(kind, sourceId));
  }

  /**
   * Target ARN of the asset a source ARN points at
   */
  resolveArn(arn: string, referencedBy?: string): string {
    const { resourceType, resourceId } = parseArn(arn);
    const entry = isAssetKind(resourceType) ? this.get(resourceType, resourceId) : undefined;
    if (!entry) {
      throw new UnresolvedDependencyError(arn, referencedBy);
    }
    return entry.targetArn;
  }

}
