/**
 * Sanitization helpers shared by the normalizers.
 *
 * Every missing optional provider field is replaced here, so the
 * normalizers and everything downstream only see defined values.
 */

import { NOT_AVAILABLE } from '@shared/types';

/**
 * Provider tag shape (EC2 style Key/Value).
 */
export interface ProviderTag {
  Key?: string;
  Value?: string;
}

/**
 * Convert provider tags to a key-value record. Tags without a key are dropped.
 */
export function tagsToRecord(tags: readonly ProviderTag[] | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key) {
      record[tag.Key] = tag.Value ?? '';
    }
  }
  return record;
}

/**
 * Value of the Name tag, or "N/A".
 */
export function displayNameFrom(tags: Record<string, string>): string {
  return tags.Name || NOT_AVAILABLE;
}

export function textOrNA(value: string | undefined | null): string {
  return value ? value : NOT_AVAILABLE;
}

/**
 * ISO-8601 timestamp, or "N/A" for a missing or invalid date.
 */
export function timestampOrNA(value: Date | undefined): string {
  if (!value || Number.isNaN(value.getTime())) {
    return NOT_AVAILABLE;
  }
  return value.toISOString();
}

/**
 * Non-negative size, 0 when missing.
 */
export function sizeOrZero(value: number | undefined | null): number {
  return typeof value === 'number' && value > 0 ? value : 0;
}

export function numberOrNull(value: number | undefined | null): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
