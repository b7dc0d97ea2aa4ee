import type { SObjectRecord } from '../types/salesforce.js';

function findKey(record: Record<string, unknown>, key: string): unknown {
  if (key in record) {
    return record[key];
  }
  const lower = key.toLowerCase();
  const match = Object.keys(record).find((candidate) => candidate.toLowerCase() === lower);
  return match === undefined ? undefined : record[match];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a dotted field path such as Account.Owner.Name on a record
 */
export function getFieldValue(record: SObjectRecord, path: string): unknown {
  let current: unknown = record;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = findKey(current, segment);
  }
  return current;
}

export function getString(record: SObjectRecord, path: string): string | null {
  const value = getFieldValue(record, path);
  return typeof value === 'string' ? value : null;
}

export function getBoolean(record: SObjectRecord, path: string): boolean {
  return getFieldValue(record, path) === true;
}
