/**
 * Floating IP scanner.
 */

import { DescribeAddressesCommand } from '@aws-sdk/client-ec2';
import type { FloatingIpResource } from '@shared/types';
import { normalizeFloatingIp } from '../normalizers';
import { BaseScanner, type ScannerContext } from './base';

export class FloatingIpScanner extends BaseScanner<'floating-ip'> {
  constructor(context: ScannerContext) {
    super('floating-ip', context);
  }

  /**
   * DescribeAddresses is not paginated; one call returns every address.
   */
  protected async collect(region: string, found: FloatingIpResource[]): Promise<void> {
    const client = this.context.clients.ec2(region);
    const response = await client.send(new DescribeAddressesCommand({}), this.sendOptions);

    for (const address of response.Addresses ?? []) {
      found.push(normalizeFloatingIp(address, region, this.context.pricing));
    }
  }
}
