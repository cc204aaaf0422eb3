import {
  dataSetDependencies,
  definitionDependencies,
  isBuiltInThemeArn,
  physicalTableDataSourceArn,
} from '../bundle/dependencies';

const arn = (type: string, id: string) => `arn:aws:quicksight:us-east-1:111111111111:${type}/${id}`;

describe('dependencies', () => {
  it('should recognise AWS-owned themes', () => {
    expect(isBuiltInThemeArn('arn:aws:quicksight::aws:theme/MIDNIGHT')).toBe(true);
    expect(isBuiltInThemeArn(arn('theme', 'brand'))).toBe(false);
  });

  it('should find the data source of every physical table kind', () => {
    expect(physicalTableDataSourceArn({ RelationalTable: { DataSourceArn: arn('datasource', 'a'), Name: 't', InputColumns: [] } })).toBe(arn('datasource', 'a'));
    expect(physicalTableDataSourceArn({ CustomSql: { DataSourceArn: arn('datasource', 'b'), Name: 'q', SqlQuery: 'select 1' } })).toBe(arn('datasource', 'b'));
    expect(physicalTableDataSourceArn({ S3Source: { DataSourceArn: arn('datasource', 'c'), InputColumns: [] } })).toBe(arn('datasource', 'c'));
  });

  it('should list the custom theme and declared datasets of a definition', () => {
    const definition = {
      DataSetIdentifierDeclarations: [
        { Identifier: 'orders', DataSetArn: arn('dataset', 'orders') },
        { Identifier: 'orders-again', DataSetArn: arn('dataset', 'orders') },
        { Identifier: 'customers', DataSetArn: arn('dataset', 'customers') },
      ],
    };

    expect(definitionDependencies(definition, arn('theme', 'brand'))).toEqual([
      'theme/brand',
      'dataset/orders',
      'dataset/customers',
    ]);
    expect(definitionDependencies(definition, 'arn:aws:quicksight::aws:theme/CLASSIC')).toEqual([
      'dataset/orders',
      'dataset/customers',
    ]);
  });

  it('should list data sources, joined datasets and the row-level security dataset', () => {
    expect(dataSetDependencies({
      PhysicalTableMap: {
        one: { RelationalTable: { DataSourceArn: arn('datasource', 'db'), Name: 'orders', InputColumns: [] } },
        two: { CustomSql: { DataSourceArn: arn('datasource', 'db'), Name: 'q', SqlQuery: 'select 1' } },
      },
      LogicalTableMap: {
        joined: { Alias: 'customers', Source: { DataSetArn: arn('dataset', 'customers') } },
        local: { Alias: 'orders', Source: { PhysicalTableId: 'one' } },
      },
      RowLevelPermissionDataSet: { Arn: arn('dataset', 'rls'), PermissionPolicy: 'GRANT_ACCESS' },
    })).toEqual(['datasource/db', 'dataset/customers', 'dataset/rls']);
  });
});
