import { BundleAsset } from '../../../types';
import { ImportedAsset, PlannedAsset } from './types';

export interface IAssetImporter<A extends BundleAsset = BundleAsset> {
  readonly kind: A['kind'];
  importAsset(planned: PlannedAsset<A>): Promise<ImportedAsset>;
}
