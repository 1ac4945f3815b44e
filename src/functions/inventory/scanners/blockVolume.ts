/**
 * Block volume scanner.
 */

import { DescribeVolumesCommand } from '@aws-sdk/client-ec2';
import type { BlockVolumeResource } from '@shared/types';
import { normalizeBlockVolume } from '../normalizers';
import { BaseScanner, type ScannerContext } from './base';

export class BlockVolumeScanner extends BaseScanner<'block-volume'> {
  constructor(context: ScannerContext) {
    super('block-volume', context);
  }

  protected async collect(region: string, found: BlockVolumeResource[]): Promise<void> {
    const client = this.context.clients.ec2(region);
    let nextToken: string | undefined;

    do {
      this.throwIfAborted();
      const response = await client.send(
        new DescribeVolumesCommand({ NextToken: nextToken }),
        this.sendOptions
      );

      for (const volume of response.Volumes ?? []) {
        found.push(normalizeBlockVolume(volume, region, this.context.pricing));
      }

      nextToken = response.NextToken;
    } while (nextToken);
  }
}
