/**
 * Compute instance normalizer.
 */

import type { Instance } from '@aws-sdk/client-ec2';
import type { ComputeResource, PriceTable } from '@shared/types';
import { unitPrice } from '@shared/pricing';
import { HOURS_PER_MONTH, multiplyPrice, round2 } from '@shared/utils/money';
import { displayNameFrom, tagsToRecord, textOrNA, timestampOrNA } from './common';

const MS_PER_HOUR = 3_600_000;

/**
 * Hours elapsed since launch, clamped to 0. Returns 0 without a launch time.
 */
export function runningHoursSince(launchTime: Date | undefined, now: Date): number {
  if (!launchTime || Number.isNaN(launchTime.getTime())) {
    return 0;
  }
  return Math.max(0, (now.getTime() - launchTime.getTime()) / MS_PER_HOUR);
}

/**
 * Normalize one DescribeInstances record.
 *
 * Monthly cost is the hourly rate for the instance type × 730 hours,
 * regardless of lifecycle state. `now` defaults to the time of the call.
 */
export function normalizeCompute(
  instance: Instance,
  region: string,
  pricing: PriceTable,
  now: Date = new Date()
): ComputeResource {
  const tags = tagsToRecord(instance.Tags);
  const instanceType = instance.InstanceType ?? 'unknown';
  const hourlyRate = unitPrice(pricing, 'compute', instanceType);

  return {
    kind: 'compute',
    identifier: textOrNA(instance.InstanceId),
    region,
    monthlyCost: multiplyPrice(hourlyRate, HOURS_PER_MONTH),
    displayName: displayNameFrom(tags),
    tags,
    instanceType,
    lifecycleState: instance.State?.Name ?? 'unknown',
    publicAddress: textOrNA(instance.PublicIpAddress),
    privateAddress: textOrNA(instance.PrivateIpAddress),
    launchTimestamp: timestampOrNA(instance.LaunchTime),
    runningHours: round2(runningHoursSince(instance.LaunchTime, now)),
    networkId: textOrNA(instance.VpcId),
    subnetId: textOrNA(instance.SubnetId),
    hourlyRate,
  };
}
