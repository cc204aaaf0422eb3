import { ValidationError } from './errors';

export interface ParsedArn {
  partition: string;
  service: string;
  region: string;
  accountId: string;
  resourceType: string;
  resourceId: string;
}

export function parseArn(arn: string): ParsedArn {
  const parts = arn.split(':');
  if (parts.length < 6 || parts[0] !== 'arn') {
    throw new ValidationError(`Not an ARN: ${arn}`);
  }

  const [, partition, service, region, accountId] = parts;
  const resource = parts.slice(5).join(':');
  const slash = resource.indexOf('/');

  return {
    partition,
    service,
    region,
    accountId,
    resourceType: slash === -1 ? resource : resource.slice(0, slash),
    resourceId: slash === -1 ? '' : resource.slice(slash + 1),
  };
}

export function formatArn(arn: ParsedArn): string {
  const resource = arn.resourceId ? `${arn.resourceType}/${arn.resourceId}` : arn.resourceType;
  return `arn:${arn.partition}:${arn.service}:${arn.region}:${arn.accountId}:${resource}`;
}

export function buildQuickSightArn(region: string, accountId: string, resourceType: string, resourceId: string, partition = 'aws'): string {
  return formatArn({ partition, service: 'quicksight', region, accountId, resourceType, resourceId });
}

export function getIdFromArn(arn: string): string {
  return arn.split('/').pop() || '';
}

/**
 * Point an ARN at another account and region, keeping the resource part
 */
export function retargetArn(arn: string, target: { accountId: string; region?: string }): string {
  const parsed = parseArn(arn);
  return formatArn({
    ...parsed,
    accountId: target.accountId,
    region: target.region ?? parsed.region,
  });
}
