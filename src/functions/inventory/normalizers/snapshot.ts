/**
 * Snapshot normalizer.
 */

import type { Snapshot } from '@aws-sdk/client-ec2';
import type { PriceTable, SnapshotResource } from '@shared/types';
import { SNAPSHOT_TIER, unitPrice } from '@shared/pricing';
import { multiplyPrice } from '@shared/utils/money';
import { displayNameFrom, sizeOrZero, tagsToRecord, textOrNA, timestampOrNA } from './common';

/**
 * Snapshots are priced on the full source volume size, not on the
 * incremental blocks actually stored.
 */
export function normalizeSnapshot(
  snapshot: Snapshot,
  region: string,
  pricing: PriceTable
): SnapshotResource {
  const tags = tagsToRecord(snapshot.Tags);
  const sizeGiB = sizeOrZero(snapshot.VolumeSize);

  return {
    kind: 'snapshot',
    identifier: textOrNA(snapshot.SnapshotId),
    region,
    monthlyCost: multiplyPrice(unitPrice(pricing, 'snapshot', SNAPSHOT_TIER), sizeGiB),
    displayName: displayNameFrom(tags),
    tags,
    sourceVolumeId: textOrNA(snapshot.VolumeId),
    sizeGiB,
    lifecycleState: snapshot.State ?? 'unknown',
    description: textOrNA(snapshot.Description),
    startTimestamp: timestampOrNA(snapshot.StartTime),
  };
}
