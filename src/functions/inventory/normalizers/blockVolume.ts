/**
 * Block volume normalizer.
 */

import type { Volume } from '@aws-sdk/client-ec2';
import type { BlockVolumeResource, PriceTable } from '@shared/types';
import { unitPrice } from '@shared/pricing';
import { multiplyPrice } from '@shared/utils/money';
import {
  displayNameFrom,
  numberOrNull,
  sizeOrZero,
  tagsToRecord,
  textOrNA,
  timestampOrNA,
} from './common';

// Volumes reported without a type are priced as general purpose.
const DEFAULT_VOLUME_TYPE = 'gp2';

export function normalizeBlockVolume(
  volume: Volume,
  region: string,
  pricing: PriceTable
): BlockVolumeResource {
  const tags = tagsToRecord(volume.Tags);
  const variant = volume.VolumeType ?? DEFAULT_VOLUME_TYPE;
  const sizeGiB = sizeOrZero(volume.Size);

  return {
    kind: 'block-volume',
    identifier: textOrNA(volume.VolumeId),
    region,
    monthlyCost: multiplyPrice(unitPrice(pricing, 'block-volume', variant), sizeGiB),
    displayName: displayNameFrom(tags),
    tags,
    variant,
    sizeGiB,
    lifecycleState: volume.State ?? 'unknown',
    encrypted: volume.Encrypted ?? false,
    iops: numberOrNull(volume.Iops),
    throughput: numberOrNull(volume.Throughput),
    createTimestamp: timestampOrNA(volume.CreateTime),
  };
}
