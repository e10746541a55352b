import { ResourceRecord } from '../types';

export function isRecord(value: unknown): value is ResourceRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A string field of a record, undefined when missing or of another type
 */
export function stringField(record: ResourceRecord, field: string): string | undefined {
  const value = record[field];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Whether an error carries the given Node error code, matched by shape so that
 * errors from another realm qualify
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return isRecord(error) && error.code === code;
}
