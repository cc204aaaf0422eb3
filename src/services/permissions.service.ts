import {
  QuickSightClient,
  DescribeAnalysisPermissionsCommand,
  DescribeDashboardPermissionsCommand,
  DescribeDataSetPermissionsCommand,
  DescribeDataSourcePermissionsCommand,
  DescribeThemePermissionsCommand,
  UpdateAnalysisPermissionsCommand,
  UpdateDashboardPermissionsCommand,
  UpdateDataSetPermissionsCommand,
  UpdateDataSourcePermissionsCommand,
  UpdateThemePermissionsCommand,
  ResourcePermission,
} from '@aws-sdk/client-quicksight';
import { AssetKind } from '../types';
import { logger } from '../utils/logger';

export interface AssetPermission {
  Principal: string;
  Actions: string[];
}

export class PermissionsService {
  constructor(
    private readonly client: QuickSightClient,
    private readonly awsAccountId: string,
  ) {}

  /**
   * Read the resource permissions of an asset
   */
  async getPermissions(kind: AssetKind, assetId: string): Promise<AssetPermission[]> {
    const AwsAccountId = this.awsAccountId;

    switch (kind) {
      case 'analysis': {
        const response = await this.client.send(new DescribeAnalysisPermissionsCommand({ AwsAccountId, AnalysisId: assetId }));
        return this.normalize(response.Permissions);
      }
      case 'dashboard': {
        const response = await this.client.send(new DescribeDashboardPermissionsCommand({ AwsAccountId, DashboardId: assetId }));
        return this.normalize(response.Permissions);
      }
      case 'dataset': {
        const response = await this.client.send(new DescribeDataSetPermissionsCommand({ AwsAccountId, DataSetId: assetId }));
        return this.normalize(response.Permissions);
      }
      case 'datasource': {
        const response = await this.client.send(new DescribeDataSourcePermissionsCommand({ AwsAccountId, DataSourceId: assetId }));
        return this.normalize(response.Permissions);
      }
      case 'theme': {
        const response = await this.client.send(new DescribeThemePermissionsCommand({ AwsAccountId, ThemeId: assetId }));
        return this.normalize(response.Permissions);
      }
    }
  }

  /**
   * Grant permissions on an existing asset. Update calls do not carry
   * permissions, so overwritten assets get theirs through here.
   */
  async grantPermissions(kind: AssetKind, assetId: string, permissions: AssetPermission[]): Promise<void> {
    if (permissions.length === 0) {
      return;
    }

    const AwsAccountId = this.awsAccountId;
    const GrantPermissions: ResourcePermission[] = permissions;

    switch (kind) {
      case 'analysis':
        await this.client.send(new UpdateAnalysisPermissionsCommand({ AwsAccountId, AnalysisId: assetId, GrantPermissions }));
        break;
      case 'dashboard':
        await this.client.send(new UpdateDashboardPermissionsCommand({ AwsAccountId, DashboardId: assetId, GrantPermissions }));
        break;
      case 'dataset':
        await this.client.send(new UpdateDataSetPermissionsCommand({ AwsAccountId, DataSetId: assetId, GrantPermissions }));
        break;
      case 'datasource':
        await this.client.send(new UpdateDataSourcePermissionsCommand({ AwsAccountId, DataSourceId: assetId, GrantPermissions }));
        break;
      case 'theme':
        await this.client.send(new UpdateThemePermissionsCommand({ AwsAccountId, ThemeId: assetId, GrantPermissions }));
        break;
    }

    logger.debug(`Granted ${permissions.length} permissions on ${kind} ${assetId}`);
  }

  private normalize(permissions: ResourcePermission[] | undefined): AssetPermission[] {
    const result: AssetPermission[] = [];
    for (const permission of permissions || []) {
      if (permission.Principal) {
        result.push({ Principal: permission.Principal, Actions: permission.Actions || [] });
      }
    }
    return result;
  }
}
