/**
 * Floating IP (Elastic IP) normalizer.
 */

import type { Address } from '@aws-sdk/client-ec2';
import type { FloatingIpResource, PriceTable } from '@shared/types';
import { FLOATING_IP_ASSOCIATED, FLOATING_IP_UNASSOCIATED, unitPrice } from '@shared/pricing';
import { HOURS_PER_MONTH, multiplyPrice } from '@shared/utils/money';
import { displayNameFrom, tagsToRecord, textOrNA } from './common';

/**
 * An address counts as associated when it references an instance, a
 * network interface or an association.
 */
export function isAssociated(address: Address): boolean {
  return Boolean(address.InstanceId || address.NetworkInterfaceId || address.AssociationId);
}

export function normalizeFloatingIp(
  address: Address,
  region: string,
  pricing: PriceTable
): FloatingIpResource {
  const tags = tagsToRecord(address.Tags);
  const associated = isAssociated(address);
  const hourlyRate = unitPrice(
    pricing,
    'floating-ip',
    associated ? FLOATING_IP_ASSOCIATED : FLOATING_IP_UNASSOCIATED
  );

  return {
    kind: 'floating-ip',
    identifier: textOrNA(address.PublicIp ?? address.AllocationId),
    region,
    monthlyCost: multiplyPrice(hourlyRate, HOURS_PER_MONTH),
    displayName: displayNameFrom(tags),
    tags,
    associated,
    domain: textOrNA(address.Domain),
    allocationId: textOrNA(address.AllocationId),
    instanceId: textOrNA(address.InstanceId),
    networkInterfaceId: textOrNA(address.NetworkInterfaceId),
    hourlyRate,
  };
}
