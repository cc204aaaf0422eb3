import { compareOutputColumns } from '../import/importers/DatasetImporter';

describe('compareOutputColumns', () => {
  const existing = [
    { Name: 'order_id', Type: 'STRING' as const },
    { Name: 'amount', Type: 'DECIMAL' as const },
    { Name: 'region', Type: 'STRING' as const },
  ];

  it('should accept identical columns', () => {
    expect(compareOutputColumns(existing, existing)).toEqual([]);
  });

  it('should accept added columns', () => {
    expect(compareOutputColumns(existing, [...existing, { Name: 'channel', Type: 'STRING' }])).toEqual([]);
  });

  it('should report removed and retyped columns', () => {
    const incoming = [
      { Name: 'order_id', Type: 'STRING' as const },
      { Name: 'amount', Type: 'STRING' as const },
    ];

    expect(compareOutputColumns(existing, incoming)).toEqual([
      { column: 'amount', change: 'type-changed', existingType: 'DECIMAL', incomingType: 'STRING' },
      { column: 'region', change: 'removed' },
    ]);
  });
});
