import type { DashboardPublishOptions } from '@aws-sdk/client-quicksight';
import { sortAssets } from '../bundle/assetGraph';
import {
  AnalysisAsset,
  AssetBundle,
  AssetKey,
  AssetKind,
  DashboardAsset,
  assetKey,
} from '../../types';
import { buildQuickSightArn } from '../../utils/arn';
import { IdentifierCollisionError, ValidationError } from '../../utils/errors';
import { ImportOptions, PlannedAsset } from './core/types';
import { ownerActionsFor } from './permissionMapper';

const ASSET_ID_PATTERN = /^[\w-]{1,512}$/;

export const PUBLISHED_DASHBOARD_SUFFIX = '_dashboard';

/**
 * Publish options of dashboards created from an analysis: every interaction
 * available to readers, sheet controls collapsed.
 */
export const PUBLISHED_DASHBOARD_OPTIONS: DashboardPublishOptions = {
  AdHocFilteringOption: { AvailabilityStatus: 'ENABLED' },
  ExportToCSVOption: { AvailabilityStatus: 'ENABLED' },
  SheetControlsOption: { VisibilityState: 'COLLAPSED' },
  SheetLayoutElementMaximizationOption: { AvailabilityStatus: 'ENABLED' },
  VisualMenuOption: { AvailabilityStatus: 'ENABLED' },
  VisualAxisSortOption: { AvailabilityStatus: 'ENABLED' },
  ExportWithHiddenFieldsOption: { AvailabilityStatus: 'DISABLED' },
  DataPointDrillUpDownOption: { AvailabilityStatus: 'ENABLED' },
  DataPointMenuLabelOption: { AvailabilityStatus: 'ENABLED' },
  DataPointTooltipOption: { AvailabilityStatus: 'ENABLED' },
};

export function publishedDashboardFor(
  bundle: AssetBundle,
  planned: PlannedAsset<AnalysisAsset>,
): PlannedAsset<DashboardAsset> {
  const { asset: analysis } = planned;
  const definition = analysis.definition.Definition;
  const id = `${analysis.id}${PUBLISHED_DASHBOARD_SUFFIX}`;

  return {
    asset: {
      kind: 'dashboard',
      id,
      name: `${analysis.name}${PUBLISHED_DASHBOARD_SUFFIX}`,
      arn: buildQuickSightArn(bundle.manifest.sourceRegion, bundle.manifest.sourceAccountId, 'dashboard', id),
      dependencies: analysis.dependencies,
      permissions: analysis.permissions
        .filter(permission => permission.Actions.includes('quicksight:UpdateAnalysis'))
        .map(permission => ({ Principal: permission.Principal, Actions: ownerActionsFor('dashboard') })),
      tags: analysis.tags,
      definition: {
        Definition: {
          DataSetIdentifierDeclarations: definition.DataSetIdentifierDeclarations,
          Sheets: definition.Sheets,
          CalculatedFields: definition.CalculatedFields,
          ParameterDeclarations: definition.ParameterDeclarations,
          FilterGroups: definition.FilterGroups,
          ColumnConfigurations: definition.ColumnConfigurations,
          AnalysisDefaults: definition.AnalysisDefaults,
          Options: definition.Options,
        },
        ThemeArn: analysis.definition.ThemeArn,
        DashboardPublishOptions: PUBLISHED_DASHBOARD_OPTIONS,
      },
    },
    targetId: `${planned.targetId}${PUBLISHED_DASHBOARD_SUFFIX}`,
    targetName: `${planned.targetName}${PUBLISHED_DASHBOARD_SUFFIX}`,
  };
}

/**
 * Order the bundle for creation and decide every target id up front, so a
 * broken bundle fails before anything is written
 */
export function planImport(
  bundle: AssetBundle,
  options: Pick<ImportOptions, 'idSuffix' | 'nameSuffix' | 'publishAnalyses'>,
): PlannedAsset[] {
  const plan: PlannedAsset[] = [];
  const targets = new Map<AssetKey, AssetKey>();

  const reserve = (kind: AssetKind, sourceId: string, targetId: string) => {
    if (!ASSET_ID_PATTERN.test(targetId)) {
      throw new ValidationError(`Target id "${targetId}" for ${kind} ${sourceId} is not a valid QuickSight id`);
    }
    const targetKey = assetKey(kind, targetId);
    const sourceKey = assetKey(kind, sourceId);
    const owner = targets.get(targetKey);
    if (owner) {
      throw new IdentifierCollisionError(`${owner} and ${sourceKey} would both be imported as ${targetKey}`);
    }
    targets.set(targetKey, sourceKey);
  };

  for (const asset of sortAssets(bundle.assets)) {
    const planned: PlannedAsset = {
      asset,
      targetId: `${asset.id}${options.idSuffix}`,
      targetName: `${asset.name}${options.nameSuffix}`,
    };
    reserve(asset.kind, asset.id, planned.targetId);
    plan.push(planned);

    if (options.publishAnalyses && asset.kind === 'analysis') {
      const dashboard = publishedDashboardFor(bundle, { ...planned, asset });
      reserve('dashboard', dashboard.asset.id, dashboard.targetId);
      plan.push(dashboard);
    }
  }

  return plan;
}
