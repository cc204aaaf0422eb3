import {
  DescribeThemeCommand,
} from '@aws-sdk/client-quicksight';
import { BaseAssetProcessor } from '../core/BaseAssetProcessor';
import { ThemeAsset } from '../../../types';
import { UnsupportedAssetError } from '../../../utils/errors';

export class ThemeProcessor extends BaseAssetProcessor<ThemeAsset> {
  readonly kind = 'theme' as const;

  async exportAsset(themeId: string): Promise<ThemeAsset> {
    const [detailResponse, [permissions, tags]] = await Promise.all([
      this.executeWithRetry(
        () => this.client.send(new DescribeThemeCommand({
          AwsAccountId: this.context.awsAccountId,
          ThemeId: themeId,
        })),
        `DescribeTheme(${themeId})`,
      ),
      this.fetchPermissionsAndTags(themeId, this.buildArn(themeId)),
    ]).catch((error: unknown) => this.rethrowDescribeError(error, themeId));

    const theme = detailResponse.Theme;
    if (theme?.Type === 'QUICKSIGHT') {
      throw new UnsupportedAssetError(`Theme ${themeId} is a QuickSight starter theme`);
    }

    const version = theme?.Version;
    if (!version?.BaseThemeId || !version.Configuration) {
      throw new UnsupportedAssetError(`Theme ${themeId} has no readable version`);
    }

    return {
      kind: this.kind,
      id: themeId,
      name: theme?.Name ?? themeId,
      arn: theme?.Arn ?? this.buildArn(themeId),
      dependencies: [],
      permissions,
      tags,
      definition: {
        BaseThemeId: version.BaseThemeId,
        Configuration: version.Configuration,
        VersionDescription: version.Description,
      },
    };
  }
}
