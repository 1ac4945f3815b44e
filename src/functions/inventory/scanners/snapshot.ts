/**
 * Snapshot scanner.
 *
 * Lists only snapshots owned by the calling account; public and shared
 * snapshots are not billed to it.
 */

import { DescribeSnapshotsCommand } from '@aws-sdk/client-ec2';
import type { SnapshotResource } from '@shared/types';
import { normalizeSnapshot } from '../normalizers';
import { BaseScanner, type ScannerContext } from './base';

const OWNER_SELF = 'self';

export class SnapshotScanner extends BaseScanner<'snapshot'> {
  constructor(context: ScannerContext) {
    super('snapshot', context);
  }

  protected async collect(region: string, found: SnapshotResource[]): Promise<void> {
    const client = this.context.clients.ec2(region);
    let nextToken: string | undefined;

    do {
      this.throwIfAborted();
      const response = await client.send(
        new DescribeSnapshotsCommand({ OwnerIds: [OWNER_SELF], NextToken: nextToken }),
        this.sendOptions
      );

      for (const snapshot of response.Snapshots ?? []) {
        found.push(normalizeSnapshot(snapshot, region, this.context.pricing));
      }

      nextToken = response.NextToken;
    } while (nextToken);
  }
}
