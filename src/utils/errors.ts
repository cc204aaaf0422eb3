import { getErrorFields } from './awsRetry';

/**
 * Base class of every failure raised by the sync pipelines themselves
 * (as opposed to errors coming back from the QuickSight API).
 */
export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends SyncError {}

export class BundleValidationError extends SyncError {
  constructor(readonly issues: string[]) {
    super(`Invalid bundle:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
  }
}

export class AssetNotFoundError extends SyncError {
  constructor(readonly kind: string, readonly assetId: string, detail?: string) {
    super(`${kind} ${assetId} not found${detail ? `: ${detail}` : ''}`);
  }
}

export class AmbiguousAssetError extends SyncError {
  constructor(readonly kind: string, readonly assetName: string, readonly candidates: string[]) {
    super(`Multiple ${kind} assets are named "${assetName}": ${candidates.join(', ')}`);
  }
}

export class UnsupportedAssetError extends SyncError {}

export class UnresolvedDependencyError extends SyncError {
  constructor(readonly reference: string, readonly referencedBy?: string) {
    super(referencedBy
      ? `${referencedBy} references ${reference}, which is neither in the bundle nor imported yet`
      : `Reference ${reference} cannot be resolved in the target account`);
  }
}

export class DependencyCycleError extends SyncError {
  constructor(readonly assetKeys: string[]) {
    super(`Dependency cycle between ${assetKeys.join(', ')}`);
  }
}

export class IdentifierCollisionError extends SyncError {}

export class AssetConflictError extends SyncError {
  constructor(readonly kind: string, readonly targetId: string) {
    super(`${kind} ${targetId} already exists in the target account; use --overwrite or --on-conflict skip`);
  }
}

export interface ColumnChange {
  column: string;
  change: 'removed' | 'type-changed';
  existingType?: string;
  incomingType?: string;
}

export class SchemaMismatchError extends SyncError {
  constructor(readonly dataSetId: string, readonly changes: ColumnChange[]) {
    super(`Dataset ${dataSetId} columns differ from the existing target dataset: ${changes.map(formatColumnChange).join('; ')}`);
  }
}

export class AssetCreationError extends SyncError {}

export class MissingPermissionError extends SyncError {}

function formatColumnChange(change: ColumnChange): string {
  if (change.change === 'removed') {
    return `${change.column} removed`;
  }
  return `${change.column} ${change.existingType} -> ${change.incomingType}`;
}

/**
 * Short user-facing message for an error from the pipelines or the AWS SDK
 */
export function describeError(error: unknown): string {
  if (error instanceof SyncError) {
    return error.message;
  }

  const { name, message } = getErrorFields(error);

  switch (name) {
    case 'AccessDeniedException':
      return `Access denied: ${message}`;
    case 'ResourceNotFoundException':
      return `Resource not found: ${message}`;
    case 'ThrottlingException':
      return `QuickSight throttled the request after retries: ${message}`;
    case 'InvalidParameterValueException':
      return `Invalid parameter: ${message}`;
    case 'UnsupportedUserEditionException':
      return `This QuickSight edition does not support the operation: ${message}`;
    case 'CredentialsProviderError':
      return `No usable AWS credentials: ${message}`;
    default:
      return message || name || 'Unknown error';
  }
}
