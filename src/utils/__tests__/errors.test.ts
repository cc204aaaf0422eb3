import { AccessDeniedException } from '@aws-sdk/client-quicksight';
import {
  AssetConflictError,
  SchemaMismatchError,
  SyncError,
  ValidationError,
  describeError,
} from '../errors';

describe('errors', () => {
  it('should name errors after their class', () => {
    const error = new ValidationError('bad input');

    expect(error).toBeInstanceOf(SyncError);
    expect(error.name).toBe('ValidationError');
  });

  it('should list column changes in schema mismatches', () => {
    const error = new SchemaMismatchError('orders', [
      { column: 'region', change: 'removed' },
      { column: 'amount', change: 'type-changed', existingType: 'DECIMAL', incomingType: 'STRING' },
    ]);

    expect(error.message).toBe('Dataset orders columns differ from the existing target dataset: region removed; amount DECIMAL -> STRING');
  });

  describe('describeError', () => {
    it('should pass sync errors through', () => {
      expect(describeError(new AssetConflictError('dashboard', 'sales'))).toBe(
        'dashboard sales already exists in the target account; use --overwrite or --on-conflict skip',
      );
    });

    it('should translate access denied', () => {
      const error = new AccessDeniedException({ $metadata: {}, message: 'not allowed' });
      expect(describeError(error)).toBe('Access denied: not allowed');
    });

    it('should fall back to the message', () => {
      expect(describeError(new Error('socket hang up'))).toBe('socket hang up');
    });
  });
});
