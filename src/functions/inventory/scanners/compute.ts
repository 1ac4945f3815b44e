/**
 * Compute instance scanner.
 */

import { DescribeInstancesCommand } from '@aws-sdk/client-ec2';
import type { ComputeResource } from '@shared/types';
import { normalizeCompute } from '../normalizers';
import { BaseScanner, type ScannerContext } from './base';

export class ComputeScanner extends BaseScanner<'compute'> {
  constructor(context: ScannerContext) {
    super('compute', context);
  }

  /**
   * Walk every DescribeInstances page, flattening reservations.
   */
  protected async collect(region: string, found: ComputeResource[]): Promise<void> {
    const client = this.context.clients.ec2(region);
    let nextToken: string | undefined;

    do {
      this.throwIfAborted();
      const response = await client.send(
        new DescribeInstancesCommand({ NextToken: nextToken }),
        this.sendOptions
      );

      for (const reservation of response.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          found.push(normalizeCompute(instance, region, this.context.pricing));
        }
      }

      nextToken = response.NextToken;
    } while (nextToken);
  }
}
