import type {
  AnalysisDefinition,
  ColumnLevelPermissionRule,
  DashboardVersionDefinition,
  DataSetIdentifierDeclaration,
  DataSourceCredentials,
  DataSourceParameters,
  LogicalTable,
  PhysicalTable,
  RowLevelPermissionDataSet,
  VpcConnectionProperties,
} from '@aws-sdk/client-quicksight';
import { isBuiltInThemeArn } from '../bundle/dependencies';
import { formatArn, parseArn, retargetArn } from '../../utils/arn';
import { ImportContext } from './core/types';

type Definition = AnalysisDefinition | DashboardVersionDefinition;

/**
 * Rewrites the references inside a definition so they point at the target
 * account: asset ARNs through the identifier map, everything else by swapping
 * account, region and namespace.
 */
export class ReferenceRemapper {
  constructor(private readonly context: ImportContext) {}

  assetArn(arn: string | undefined, referencedBy: string): string | undefined {
    return arn === undefined ? undefined : this.context.identifiers.resolveArn(arn, referencedBy);
  }

  themeArn(arn: string | undefined, referencedBy: string): string | undefined {
    if (arn === undefined || isBuiltInThemeArn(arn)) {
      return arn;
    }
    return this.context.identifiers.resolveArn(arn, referencedBy);
  }

  namespace(namespace: string): string {
    return namespace === this.context.source.namespace ? this.context.options.namespace : namespace;
  }

  /**
   * QuickSight user, group and namespace ARNs
   */
  principal(principal: string): string {
    const parsed = parseArn(principal);
    if (parsed.service !== 'quicksight') {
      return principal;
    }

    let resourceId = parsed.resourceId;
    if (parsed.resourceType === 'user' || parsed.resourceType === 'group') {
      const slash = resourceId.indexOf('/');
      if (slash !== -1) {
        resourceId = `${this.namespace(resourceId.slice(0, slash))}${resourceId.slice(slash)}`;
      }
    } else if (parsed.resourceType === 'namespace') {
      resourceId = this.namespace(resourceId);
    }

    return formatArn({
      ...parsed,
      accountId: this.context.awsAccountId,
      region: this.context.options.identityRegion ?? parsed.region,
      resourceId,
    });
  }

  /**
   * IAM roles and Secrets Manager secrets of the source account. IAM ARNs have
   * no region and keep none.
   */
  accountArn(arn: string): string {
    if (!arn.startsWith('arn:')) {
      return arn;
    }
    const parsed = parseArn(arn);
    if (parsed.accountId !== this.context.source.sourceAccountId) {
      return arn;
    }
    return formatArn({
      ...parsed,
      accountId: this.context.awsAccountId,
      region: parsed.region && this.context.region,
    });
  }

  dataSourceParameters(parameters: DataSourceParameters | undefined): DataSourceParameters | undefined {
    if (parameters?.AthenaParameters?.RoleArn) {
      return {
        AthenaParameters: { ...parameters.AthenaParameters, RoleArn: this.accountArn(parameters.AthenaParameters.RoleArn) },
      };
    }
    if (parameters?.S3Parameters?.RoleArn) {
      return {
        S3Parameters: { ...parameters.S3Parameters, RoleArn: this.accountArn(parameters.S3Parameters.RoleArn) },
      };
    }
    const iam = parameters?.RedshiftParameters?.IAMParameters;
    if (parameters?.RedshiftParameters && iam?.RoleArn) {
      return {
        RedshiftParameters: {
          ...parameters.RedshiftParameters,
          IAMParameters: { ...iam, RoleArn: this.accountArn(iam.RoleArn) },
        },
      };
    }
    return parameters;
  }

  dataSourceCredentials(credentials: DataSourceCredentials | undefined): DataSourceCredentials | undefined {
    if (!credentials) {
      return undefined;
    }
    return {
      ...credentials,
      CopySourceArn: credentials.CopySourceArn === undefined ? undefined : this.accountArn(credentials.CopySourceArn),
      SecretArn: credentials.SecretArn === undefined ? undefined : this.accountArn(credentials.SecretArn),
    };
  }

  vpcConnection(properties: VpcConnectionProperties | undefined): VpcConnectionProperties | undefined {
    if (!properties?.VpcConnectionArn) {
      return properties;
    }
    return {
      VpcConnectionArn: retargetArn(properties.VpcConnectionArn, {
        accountId: this.context.awsAccountId,
        region: this.context.region,
      }),
    };
  }

  physicalTable(table: PhysicalTable, referencedBy: string): PhysicalTable {
    if (table.RelationalTable) {
      return {
        RelationalTable: {
          ...table.RelationalTable,
          DataSourceArn: this.assetArn(table.RelationalTable.DataSourceArn, referencedBy),
        },
      };
    }
    if (table.CustomSql) {
      return {
        CustomSql: {
          ...table.CustomSql,
          DataSourceArn: this.assetArn(table.CustomSql.DataSourceArn, referencedBy),
        },
      };
    }
    if (table.S3Source) {
      return {
        S3Source: {
          ...table.S3Source,
          DataSourceArn: this.assetArn(table.S3Source.DataSourceArn, referencedBy),
        },
      };
    }
    return table;
  }

  logicalTable(table: LogicalTable, referencedBy: string): LogicalTable {
    if (!table.Source?.DataSetArn) {
      return table;
    }
    return {
      ...table,
      Source: {
        ...table.Source,
        DataSetArn: this.assetArn(table.Source.DataSetArn, referencedBy),
      },
    };
  }

  rowLevelPermissionDataSet(
    dataSet: RowLevelPermissionDataSet | undefined,
    referencedBy: string,
  ): RowLevelPermissionDataSet | undefined {
    if (!dataSet) {
      return undefined;
    }
    return {
      ...dataSet,
      Arn: this.assetArn(dataSet.Arn, referencedBy),
      Namespace: dataSet.Namespace === undefined ? undefined : this.namespace(dataSet.Namespace),
    };
  }

  columnLevelPermissionRules(rules: ColumnLevelPermissionRule[] | undefined): ColumnLevelPermissionRule[] | undefined {
    return rules?.map(rule => ({
      ...rule,
      Principals: rule.Principals?.map(principal => this.principal(principal)),
    }));
  }

  definition<D extends Definition>(definition: D, referencedBy: string): D {
    const declarations: DataSetIdentifierDeclaration[] = (definition.DataSetIdentifierDeclarations || [])
      .map(declaration => ({
        ...declaration,
        DataSetArn: this.assetArn(declaration.DataSetArn, referencedBy),
      }));
    return { ...definition, DataSetIdentifierDeclarations: declarations };
  }
}
