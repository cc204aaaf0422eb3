import { AssetBundle, AssetKey, KindCounts } from '../../../types';
import { RetryOptions } from '../../../utils/awsRetry';

export interface ExportContext {
  awsAccountId: string;
  region: string;
  namespace: string;
  includePermissions: boolean;
  includeTags: boolean;
  retry?: RetryOptions;
}

export interface ExportRequest {
  analysisIds?: string[];
  dashboardIds?: string[];
  analysisNames?: string[];
  dashboardNames?: string[];
}

export interface ExportResult {
  bundle: AssetBundle;
  rootAssets: AssetKey[];
  counts: KindCounts;
  duration: number;
}
