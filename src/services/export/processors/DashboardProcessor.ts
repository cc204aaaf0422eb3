import {
  DescribeDashboardCommand,
  DescribeDashboardDefinitionCommand,
} from '@aws-sdk/client-quicksight';
import { BaseAssetProcessor } from '../core/BaseAssetProcessor';
import { DashboardAsset } from '../../../types';
import { definitionDependencies } from '../../bundle/dependencies';
import { AssetNotFoundError, UnsupportedAssetError } from '../../../utils/errors';

export class DashboardProcessor extends BaseAssetProcessor<DashboardAsset> {
  readonly kind = 'dashboard' as const;

  async exportAsset(dashboardId: string): Promise<DashboardAsset> {
    const AwsAccountId = this.context.awsAccountId;

    // Fetch definition, details, permissions, and tags in parallel
    const [definitionResponse, detailResponse, [permissions, tags]] = await Promise.all([
      this.executeWithRetry(
        () => this.client.send(new DescribeDashboardDefinitionCommand({
          AwsAccountId,
          DashboardId: dashboardId,
        })),
        `DescribeDashboardDefinition(${dashboardId})`,
      ),
      this.executeWithRetry(
        () => this.client.send(new DescribeDashboardCommand({
          AwsAccountId,
          DashboardId: dashboardId,
        })),
        `DescribeDashboard(${dashboardId})`,
      ),
      this.fetchPermissionsAndTags(dashboardId, this.buildArn(dashboardId)),
    ]).catch((error: unknown) => this.rethrowDescribeError(error, dashboardId));

    const definition = definitionResponse.Definition;
    if (!definition) {
      throw new AssetNotFoundError(this.kind, dashboardId, 'no definition returned');
    }
    if (definitionResponse.ResourceStatus === 'CREATION_FAILED') {
      throw new UnsupportedAssetError(`Dashboard ${dashboardId} is in state CREATION_FAILED and cannot be exported`);
    }

    const dashboard = detailResponse.Dashboard;
    const themeArn = definitionResponse.ThemeArn ?? dashboard?.Version?.ThemeArn;

    return {
      kind: this.kind,
      id: dashboardId,
      name: definitionResponse.Name ?? dashboard?.Name ?? dashboardId,
      arn: dashboard?.Arn ?? this.buildArn(dashboardId),
      dependencies: definitionDependencies(definition, themeArn),
      permissions,
      tags,
      definition: {
        Definition: definition,
        ThemeArn: themeArn,
        DashboardPublishOptions: definitionResponse.DashboardPublishOptions,
        VersionDescription: dashboard?.Version?.Description,
      },
    };
  }
}
