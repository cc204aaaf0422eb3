import { IdentifierMap } from '../import/identifierMap';
import { IdentifierCollisionError, UnresolvedDependencyError } from '../../utils/errors';

describe('IdentifierMap', () => {
  const targetArn = 'arn:aws:quicksight:us-east-1:222222222222:dataset/orders';
  let identifiers: IdentifierMap;

  beforeEach(() => {
    identifiers = new IdentifierMap();
    identifiers.register({ kind: 'dataset', sourceId: 'orders', targetId: 'orders', targetArn });
  });

  it('should resolve a source ARN to the target ARN', () => {
    expect(identifiers.resolveArn('arn:aws:quicksight:us-east-1:111111111111:dataset/orders')).toBe(targetArn);
  });

  it('should accept registering the same mapping twice', () => {
    identifiers.register({ kind: 'dataset', sourceId: 'orders', targetId: 'orders', targetArn });

    expect(identifiers.get('dataset', 'orders')).toEqual({ kind: 'dataset', sourceId: 'orders', targetId: 'orders', targetArn });
  });

  it('should reject two sources mapped to one target', () => {
    expect(() => identifiers.register({ kind: 'dataset', sourceId: 'orders-v2', targetId: 'orders', targetArn }))
      .toThrow(new IdentifierCollisionError('dataset/orders and dataset/orders-v2 both map to dataset/orders'));
  });

  it('should reject remapping a source', () => {
    expect(() => identifiers.register({ kind: 'dataset', sourceId: 'orders', targetId: 'orders-copy', targetArn }))
      .toThrow(IdentifierCollisionError);
  });

  it('should keep kinds apart', () => {
    identifiers.register({
      kind: 'analysis',
      sourceId: 'orders',
      targetId: 'orders',
      targetArn: 'arn:aws:quicksight:us-east-1:222222222222:analysis/orders',
    });

    expect(identifiers.get('analysis', 'orders')?.targetArn).toBe('arn:aws:quicksight:us-east-1:222222222222:analysis/orders');
    expect(identifiers.get('dataset', 'orders')?.targetArn).toBe(targetArn);
  });

  it('should reject references to assets not imported yet', () => {
    expect(() => identifiers.resolveArn('arn:aws:quicksight:us-east-1:111111111111:datasource/db', 'dataset/orders'))
      .toThrow(new UnresolvedDependencyError('arn:aws:quicksight:us-east-1:111111111111:datasource/db', 'dataset/orders'));
  });
});
