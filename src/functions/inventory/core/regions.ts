/**
 * Region enumeration for "all regions" scans.
 */

import { DescribeRegionsCommand } from '@aws-sdk/client-ec2';
import { setupLogger } from '@shared/utils/logger';
import type { ClientFactory } from './clients';

const logger = setupLogger('cost-inventory:regions');

/**
 * Region the region listing call itself is sent to.
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * List the regions enabled for the account, in provider order.
 * Regions the account has not opted into are skipped.
 *
 * @throws the provider error when the listing call fails
 */
export async function listEnabledRegions(
  clients: ClientFactory,
  signal?: AbortSignal
): Promise<string[]> {
  const region = process.env.AWS_REGION || DEFAULT_REGION;
  const response = await clients
    .ec2(region)
    .send(new DescribeRegionsCommand({}), signal ? { abortSignal: signal } : {});

  const regions = (response.Regions ?? [])
    .filter((r) => r.OptInStatus !== 'not-opted-in')
    .map((r) => r.RegionName)
    .filter((name): name is string => Boolean(name));

  logger.debug({ regions }, `Resolved ${regions.length} enabled regions`);
  return regions;
}

/**
 * Parse a region selection: "all" (case-insensitive) or a comma-separated list.
 * Blank entries are dropped and duplicates removed, keeping first occurrence.
 */
export function parseRegionSelection(value: string | readonly string[]): 'all' | string[] {
  const entries = typeof value === 'string' ? value.split(',') : value;
  const regions: string[] = [];

  for (const entry of entries) {
    const region = entry.trim();
    if (region.toLowerCase() === 'all') {
      return 'all';
    }
    if (region && !regions.includes(region)) {
      regions.push(region);
    }
  }

  return regions.length > 0 ? regions : 'all';
}
