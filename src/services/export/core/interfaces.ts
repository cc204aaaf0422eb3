import { BundleAsset } from '../../../types';

export interface IAssetProcessor<A extends BundleAsset = BundleAsset> {
  readonly kind: A['kind'];

  /**
   * Describe one asset and normalize it into its portable bundle form,
   * dependencies included
   */
  exportAsset(assetId: string): Promise<A>;
}
