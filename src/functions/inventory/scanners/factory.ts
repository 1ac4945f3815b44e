/**
 * Simple factory for creating kind-specific scanners.
 *
 * Maps resource kinds to their scanner classes.
 */

import type { ResourceKind } from '@shared/types';
import type { RegionScanner, ScannerContext } from './base';
import { BlockVolumeScanner } from './blockVolume';
import { ComputeScanner } from './compute';
import { FloatingIpScanner } from './floatingIp';
import { ObjectStoreScanner } from './objectStore';
import { SnapshotScanner } from './snapshot';

/**
 * Get the scanner for a resource kind.
 *
 * @param kind - Resource kind to scan
 * @param context - Pricing, clients and abort signal for the run
 */
export function getScanner(kind: ResourceKind, context: ScannerContext): RegionScanner {
  switch (kind) {
    case 'compute':
      return new ComputeScanner(context);
    case 'block-volume':
      return new BlockVolumeScanner(context);
    case 'object-store':
      return new ObjectStoreScanner(context);
    case 'floating-ip':
      return new FloatingIpScanner(context);
    case 'snapshot':
      return new SnapshotScanner(context);
  }
}
