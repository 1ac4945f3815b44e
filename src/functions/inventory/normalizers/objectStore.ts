/**
 * Object store (bucket) normalizer.
 */

import type { ObjectStoreResource, PriceTable } from '@shared/types';
import { OBJECT_STORE_TIER, unitPrice } from '@shared/pricing';
import { multiplyPrice } from '@shared/utils/money';
import { sizeOrZero, textOrNA, timestampOrNA } from './common';

const BYTES_PER_GIB = 1024 ** 3;

/**
 * Bucket listing entry enriched by the scanner.
 */
export interface BucketRecord {
  name?: string;
  creationDate?: Date;
  /**
   * Sum of object sizes from the first listing page, 0 when the listing failed.
   */
  totalBytes?: number;
  tags?: Record<string, string>;
}

export function normalizeObjectStore(
  bucket: BucketRecord,
  region: string,
  pricing: PriceTable
): ObjectStoreResource {
  const tags = bucket.tags ?? {};
  const sizeGiB = sizeOrZero(bucket.totalBytes) / BYTES_PER_GIB;

  return {
    kind: 'object-store',
    identifier: textOrNA(bucket.name),
    region,
    monthlyCost: multiplyPrice(unitPrice(pricing, 'object-store', OBJECT_STORE_TIER), sizeGiB),
    // Buckets carry their own name, so prefer it over N/A.
    displayName: tags.Name || textOrNA(bucket.name),
    tags,
    sizeGiB,
    sizeIsApproximate: true,
    createTimestamp: timestampOrNA(bucket.creationDate),
  };
}
