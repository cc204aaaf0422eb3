import { isRecord } from './bundle.schema';

// Exactly what Date.prototype.toJSON produces
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

/**
 * Definition properties the QuickSight API types as timestamps, by the keys
 * that lead to them. Array indices are not part of a path.
 */
const TIMESTAMP_PATHS: readonly string[][] = [
  ['DateTimeParameterDeclaration', 'DefaultValues', 'StaticValues'],
  ['DateTimeParameterDeclaration', 'ValuesWhenUnset', 'CustomValue'],
  ['DateTimeDatasetParameter', 'DefaultValues', 'StaticValues'],
  ['TimeEqualityFilter', 'Value'],
  ['TimeRangeFilter', 'RangeMinimumValue', 'StaticValue'],
  ['TimeRangeFilter', 'RangeMaximumValue', 'StaticValue'],
  ['TimeRangeDrillDownFilter', 'RangeMinimum'],
  ['TimeRangeDrillDownFilter', 'RangeMaximum'],
];

function isTimestampPath(path: string[]): boolean {
  return TIMESTAMP_PATHS.some(suffix =>
    path.length >= suffix.length
    && suffix.every((key, index) => path[path.length - suffix.length + index] === key));
}

function toDate(value: unknown): unknown {
  return typeof value === 'string' && ISO_TIMESTAMP.test(value) ? new Date(value) : value;
}

/**
 * Turn the timestamps of a parsed definition back into `Date` values, in place.
 * JSON only carries them as ISO strings.
 */
export function reviveTimestamps(value: unknown, path: string[] = []): void {
  if (Array.isArray(value)) {
    const leaf = isTimestampPath(path);
    for (let index = 0; index < value.length; index++) {
      if (leaf) {
        value[index] = toDate(value[index]);
      } else {
        reviveTimestamps(value[index], path);
      }
    }
    return;
  }

  if (!isRecord(value)) {
    return;
  }

  for (const [key, child] of Object.entries(value)) {
    const childPath = [...path, key];
    if (!Array.isArray(child) && isTimestampPath(childPath)) {
      value[key] = toDate(child);
    } else {
      reviveTimestamps(child, childPath);
    }
  }
}
