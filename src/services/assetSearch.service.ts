import {
  QuickSightClient,
  SearchAnalysesCommand,
  SearchDashboardsCommand,
  AnalysisFilterAttribute,
  DashboardFilterAttribute,
  FilterOperator,
} from '@aws-sdk/client-quicksight';
import { AmbiguousAssetError, AssetNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

interface NamedSummary {
  id: string;
  name?: string;
}

/**
 * Resolves analysis and dashboard names to ids. A name must match exactly one asset.
 */
export class AssetSearchService {
  constructor(
    private readonly client: QuickSightClient,
    private readonly awsAccountId: string,
  ) {}

  async findAnalysisId(name: string): Promise<string> {
    const matches: NamedSummary[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(new SearchAnalysesCommand({
        AwsAccountId: this.awsAccountId,
        Filters: [{
          Operator: FilterOperator.StringEquals,
          Name: AnalysisFilterAttribute.ANALYSIS_NAME,
          Value: name,
        }],
        MaxResults: 10,
        NextToken: nextToken,
      }));

      for (const summary of response.AnalysisSummaryList || []) {
        if (summary.AnalysisId && summary.Status !== 'DELETED') {
          matches.push({ id: summary.AnalysisId, name: summary.Name });
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return this.single('analysis', name, matches);
  }

  async findDashboardId(name: string): Promise<string> {
    const matches: NamedSummary[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(new SearchDashboardsCommand({
        AwsAccountId: this.awsAccountId,
        Filters: [{
          Operator: FilterOperator.StringEquals,
          Name: DashboardFilterAttribute.DASHBOARD_NAME,
          Value: name,
        }],
        MaxResults: 10,
        NextToken: nextToken,
      }));

      for (const summary of response.DashboardSummaryList || []) {
        if (summary.DashboardId) {
          matches.push({ id: summary.DashboardId, name: summary.Name });
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return this.single('dashboard', name, matches);
  }

  private single(kind: string, name: string, matches: NamedSummary[]): string {
    if (matches.length === 0) {
      throw new AssetNotFoundError(kind, name, 'no asset with that name');
    }
    if (matches.length > 1) {
      throw new AmbiguousAssetError(kind, name, matches.map(match => match.id));
    }
    logger.debug(`Resolved ${kind} name "${name}" to ${matches[0].id}`);
    return matches[0].id;
  }
}
