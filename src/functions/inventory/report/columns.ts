/**
 * Per-kind report labels and table columns, shared by the text and CSV
 * renderers.
 */

import type { ResourceByKind, ResourceCollections, ResourceKind } from '@shared/types';
import { formatCurrency, round2 } from '@shared/utils/money';

export interface Column<R> {
  header: string;
  /** Fixed width in the text report. */
  width: number;
  value: (resource: R) => string;
  /** Rendered with a leading "$" in the text report. */
  currency?: boolean;
}

type KindColumns = { readonly [K in ResourceKind]: readonly Column<ResourceByKind[K]>[] };

/**
 * Section titles, e.g. "EC2 INSTANCES".
 */
export const KIND_TITLES: Readonly<Record<ResourceKind, string>> = {
  compute: 'EC2 INSTANCES',
  'block-volume': 'EBS VOLUMES',
  'object-store': 'S3 BUCKETS',
  'floating-ip': 'ELASTIC IPS',
  snapshot: 'EBS SNAPSHOTS',
};

/**
 * Labels for resource counts in summaries.
 */
export const KIND_COUNT_LABELS: Readonly<Record<ResourceKind, string>> = {
  compute: 'EC2 Instances',
  'block-volume': 'EBS Volumes',
  'object-store': 'S3 Buckets',
  'floating-ip': 'Elastic IPs',
  snapshot: 'Snapshots',
};

/**
 * Labels for cost lines.
 */
export const KIND_COST_LABELS: Readonly<Record<ResourceKind, string>> = {
  compute: 'EC2',
  'block-volume': 'EBS',
  'object-store': 'S3',
  'floating-ip': 'EIP',
  snapshot: 'Snapshot',
};

const monthlyCost = {
  header: 'Monthly Cost',
  width: 15,
  value: (r: { monthlyCost: number }) => formatCurrency(r.monthlyCost),
  currency: true,
};

const region = {
  header: 'Region',
  width: 15,
  value: (r: { region: string }) => r.region,
};

const name = {
  header: 'Name',
  width: 20,
  value: (r: { displayName: string }) => r.displayName,
};

export const KIND_COLUMNS: KindColumns = {
  compute: [
    { header: 'Instance ID', width: 20, value: (r) => r.identifier },
    { header: 'Type', width: 15, value: (r) => r.instanceType },
    { header: 'State', width: 12, value: (r) => r.lifecycleState },
    region,
    monthlyCost,
    name,
  ],
  'block-volume': [
    { header: 'Volume ID', width: 20, value: (r) => r.identifier },
    { header: 'Type', width: 10, value: (r) => r.variant },
    { header: 'Size (GB)', width: 12, value: (r) => String(r.sizeGiB) },
    { header: 'State', width: 12, value: (r) => r.lifecycleState },
    region,
    monthlyCost,
    name,
  ],
  'object-store': [
    { header: 'Bucket Name', width: 30, value: (r) => r.identifier },
    region,
    { header: 'Size (GB)', width: 15, value: (r) => round2(r.sizeGiB).toFixed(2) },
    monthlyCost,
  ],
  'floating-ip': [
    { header: 'Public IP', width: 15, value: (r) => r.identifier },
    region,
    { header: 'Associated', width: 12, value: (r) => (r.associated ? 'Yes' : 'No') },
    monthlyCost,
  ],
  snapshot: [
    { header: 'Snapshot ID', width: 25, value: (r) => r.identifier },
    { header: 'Volume ID', width: 20, value: (r) => r.sourceVolumeId },
    { header: 'State', width: 12, value: (r) => r.lifecycleState },
    { header: 'Size (GB)', width: 12, value: (r) => String(r.sizeGiB) },
    region,
    monthlyCost,
    name,
  ],
};

/**
 * Columns and rows of one kind, typed together.
 */
export function kindTable<K extends ResourceKind>(
  kind: K,
  collections: ResourceCollections
): { columns: readonly Column<ResourceByKind[K]>[]; resources: readonly ResourceByKind[K][] } {
  const columns: readonly Column<ResourceByKind[K]>[] = KIND_COLUMNS[kind];
  const resources: readonly ResourceByKind[K][] = collections[kind];
  return { columns, resources };
}

/**
 * Cell values of one table, header first.
 */
export function tableRows<R>(columns: readonly Column<R>[], resources: readonly R[]): string[][] {
  return [
    columns.map((column) => column.header),
    ...resources.map((resource) => columns.map((column) => column.value(resource))),
  ];
}
