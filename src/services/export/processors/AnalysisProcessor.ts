import {
  DescribeAnalysisCommand,
  DescribeAnalysisDefinitionCommand,
} from '@aws-sdk/client-quicksight';
import { BaseAssetProcessor } from '../core/BaseAssetProcessor';
import { AnalysisAsset } from '../../../types';
import { definitionDependencies } from '../../bundle/dependencies';
import { AssetNotFoundError, UnsupportedAssetError } from '../../../utils/errors';
import { logger } from '../../../utils/logger';

export class AnalysisProcessor extends BaseAssetProcessor<AnalysisAsset> {
  readonly kind = 'analysis' as const;

  async exportAsset(analysisId: string): Promise<AnalysisAsset> {
    const AwsAccountId = this.context.awsAccountId;

    // Fetch definition, details, permissions and tags together
    const [definitionResponse, detailResponse, [permissions, tags]] = await Promise.all([
      this.executeWithRetry(
        () => this.client.send(new DescribeAnalysisDefinitionCommand({
          AwsAccountId,
          AnalysisId: analysisId,
        })),
        `DescribeAnalysisDefinition(${analysisId})`,
      ),
      this.executeWithRetry(
        () => this.client.send(new DescribeAnalysisCommand({
          AwsAccountId,
          AnalysisId: analysisId,
        })),
        `DescribeAnalysis(${analysisId})`,
      ),
      this.fetchPermissionsAndTags(analysisId, this.buildArn(analysisId)),
    ]).catch((error: unknown) => this.rethrowDescribeError(error, analysisId));

    const definition = definitionResponse.Definition;
    if (!definition) {
      throw new AssetNotFoundError(this.kind, analysisId, 'no definition returned');
    }
    if (definitionResponse.ResourceStatus === 'CREATION_FAILED') {
      throw new UnsupportedAssetError(`Analysis ${analysisId} is in state CREATION_FAILED and cannot be exported`);
    }

    const themeArn = definitionResponse.ThemeArn ?? detailResponse.Analysis?.ThemeArn;
    const dependencies = definitionDependencies(definition, themeArn);
    logger.debug(`Analysis ${analysisId} depends on ${dependencies.join(', ') || 'nothing'}`);

    return {
      kind: this.kind,
      id: analysisId,
      name: definitionResponse.Name ?? detailResponse.Analysis?.Name ?? analysisId,
      arn: detailResponse.Analysis?.Arn ?? this.buildArn(analysisId),
      dependencies,
      permissions,
      tags,
      definition: {
        Definition: definition,
        ThemeArn: themeArn,
      },
    };
  }
}
