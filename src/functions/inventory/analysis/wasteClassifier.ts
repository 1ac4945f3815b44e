/**
 * Idle and unused resource detection.
 */

import type { ScanSession, WasteReport } from '@shared/types';

export const NO_WASTE_RECOMMENDATION = 'No obviously unused resources found';

/**
 * Flag stopped instances, detached volumes and unassociated addresses.
 */
export function classifyWaste(session: ScanSession): WasteReport {
  const { collections } = session;

  const stoppedCompute = collections.compute.filter((r) => r.lifecycleState === 'stopped');
  const detachedVolumes = collections['block-volume'].filter(
    (r) => r.lifecycleState === 'available'
  );
  const unassociatedFloatingIPs = collections['floating-ip'].filter((r) => !r.associated);

  const recommendations: string[] = [];
  if (stoppedCompute.length > 0) {
    recommendations.push(
      `Found ${stoppedCompute.length} stopped EC2 instances that may be costing money`
    );
  }
  if (detachedVolumes.length > 0) {
    recommendations.push(
      `Found ${detachedVolumes.length} unattached EBS volumes that may be costing money`
    );
  }
  if (unassociatedFloatingIPs.length > 0) {
    recommendations.push(
      `Found ${unassociatedFloatingIPs.length} unassociated Elastic IPs that are incurring charges`
    );
  }
  if (recommendations.length === 0) {
    recommendations.push(NO_WASTE_RECOMMENDATION);
  }

  return { stoppedCompute, detachedVolumes, unassociatedFloatingIPs, recommendations };
}
