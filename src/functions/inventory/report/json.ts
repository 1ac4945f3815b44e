/**
 * JSON report.
 */

import type { CanonicalResource, InventoryResult, InventoryStatus, ScanError } from '@shared/types';

export interface JsonReport {
  metadata: {
    generated_on: string;
    version: string;
    status: InventoryStatus;
    interrupted: boolean;
    regions: readonly string[];
    kinds: readonly string[];
  };
  summary: {
    total_ec2_instances: number;
    total_ebs_volumes: number;
    total_s3_buckets: number;
    total_eips: number;
    total_snapshots: number;
  };
  cost_summary: {
    EC2: number;
    EBS: number;
    S3: number;
    EIP: number;
    Snapshots: number;
    Total: number;
  };
  resources: {
    ec2_instances: readonly CanonicalResource[];
    ebs_volumes: readonly CanonicalResource[];
    s3_buckets: readonly CanonicalResource[];
    elastic_ips: readonly CanonicalResource[];
    snapshots: readonly CanonicalResource[];
  };
  recommendations: {
    unused_ec2_instances: number;
    unattached_ebs_volumes: number;
    unassociated_eips: number;
    messages: readonly string[];
  };
  errors: readonly ScanError[];
}

export function buildJsonReport(
  result: InventoryResult,
  generatedAt: Date,
  version: string
): JsonReport {
  const { session, costSummary, waste } = result;
  const { collections } = session;

  return {
    metadata: {
      generated_on: generatedAt.toISOString(),
      version,
      status: result.status,
      interrupted: session.interrupted,
      regions: session.regions,
      kinds: session.kinds,
    },
    summary: {
      total_ec2_instances: collections.compute.length,
      total_ebs_volumes: collections['block-volume'].length,
      total_s3_buckets: collections['object-store'].length,
      total_eips: collections['floating-ip'].length,
      total_snapshots: collections.snapshot.length,
    },
    cost_summary: {
      EC2: costSummary.byKind.compute,
      EBS: costSummary.byKind['block-volume'],
      S3: costSummary.byKind['object-store'],
      EIP: costSummary.byKind['floating-ip'],
      Snapshots: costSummary.byKind.snapshot,
      Total: costSummary.overallTotal,
    },
    resources: {
      ec2_instances: collections.compute,
      ebs_volumes: collections['block-volume'],
      s3_buckets: collections['object-store'],
      elastic_ips: collections['floating-ip'],
      snapshots: collections.snapshot,
    },
    recommendations: {
      unused_ec2_instances: waste.stoppedCompute.length,
      unattached_ebs_volumes: waste.detachedVolumes.length,
      unassociated_eips: waste.unassociatedFloatingIPs.length,
      messages: waste.recommendations,
    },
    errors: session.errors,
  };
}

/**
 * Render the JSON report, indented by two spaces.
 */
export function renderJsonReport(
  result: InventoryResult,
  generatedAt: Date,
  version: string
): string {
  return `${JSON.stringify(buildJsonReport(result, generatedAt, version), null, 2)}\n`;
}
