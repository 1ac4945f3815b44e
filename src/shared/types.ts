/**
 * Core type definitions for Cloud Cost Inventory.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Inventoried resource categories.
 */
export type ResourceKind = 'compute' | 'block-volume' | 'object-store' | 'floating-ip' | 'snapshot';

/**
 * All kinds in scan and report order.
 */
export const RESOURCE_KINDS: readonly ResourceKind[] = [
  'compute',
  'block-volume',
  'object-store',
  'floating-ip',
  'snapshot',
];

/**
 * Kinds listed per region. Object storage is listed once, globally.
 */
export const REGION_SCOPED_KINDS: readonly ResourceKind[] = [
  'compute',
  'block-volume',
  'floating-ip',
  'snapshot',
];

/**
 * Placeholder for display strings the provider did not return.
 */
export const NOT_AVAILABLE = 'N/A';

/**
 * Region label used for scans that are not scoped to a region.
 */
export const GLOBAL_REGION = 'global';

/**
 * Fields shared by every canonical resource.
 */
interface ResourceBase {
  identifier: string;
  region: string;
  /** Estimated monthly cost in USD, never negative. */
  monthlyCost: number;
  /** Value of the Name tag, or "N/A". */
  displayName: string;
  tags: Record<string, string>;
}

export interface ComputeResource extends ResourceBase {
  kind: 'compute';
  instanceType: string;
  /**
   * Provider lifecycle state, e.g. "running", "stopped", "pending".
   */
  lifecycleState: string;
  publicAddress: string;
  privateAddress: string;
  launchTimestamp: string;
  /** Hours since launch at normalization time, two decimals. */
  runningHours: number;
  networkId: string;
  subnetId: string;
  hourlyRate: number;
}

export interface BlockVolumeResource extends ResourceBase {
  kind: 'block-volume';
  /** Provider volume class (gp2, gp3, io1, ...). */
  variant: string;
  sizeGiB: number;
  /**
   * "in-use", "available", "creating", ...
   */
  lifecycleState: string;
  encrypted: boolean;
  iops: number | null;
  throughput: number | null;
  createTimestamp: string;
}

export interface ObjectStoreResource extends ResourceBase {
  kind: 'object-store';
  /**
   * Sum of object sizes from the first listing page only.
   * Buckets holding more objects than one page are understated.
   */
  sizeGiB: number;
  sizeIsApproximate: true;
  createTimestamp: string;
}

export interface FloatingIpResource extends ResourceBase {
  kind: 'floating-ip';
  associated: boolean;
  domain: string;
  allocationId: string;
  instanceId: string;
  networkInterfaceId: string;
  hourlyRate: number;
}

export interface SnapshotResource extends ResourceBase {
  kind: 'snapshot';
  sourceVolumeId: string;
  sizeGiB: number;
  lifecycleState: string;
  description: string;
  startTimestamp: string;
}

/**
 * Provider-neutral resource record, tagged by kind.
 */
export type CanonicalResource =
  | ComputeResource
  | BlockVolumeResource
  | ObjectStoreResource
  | FloatingIpResource
  | SnapshotResource;

/**
 * Maps a kind to its canonical record type.
 */
export interface ResourceByKind {
  compute: ComputeResource;
  'block-volume': BlockVolumeResource;
  'object-store': ObjectStoreResource;
  'floating-ip': FloatingIpResource;
  snapshot: SnapshotResource;
}

/**
 * Failure details for one (region, kind) scan.
 */
export interface ScanError {
  kind: ResourceKind | 'regions';
  region: string;
  /** Provider error name or code, e.g. "UnauthorizedOperation". */
  code: string;
  message: string;
  /** False when the error was not a known regional/permission failure. */
  recoverable: boolean;
  timestamp: string;
}

/**
 * Outcome of scanning one kind in one region.
 */
export type RegionScanResult<K extends ResourceKind = ResourceKind> =
  | {
      ok: true;
      kind: K;
      region: string;
      resources: ResourceByKind[K][];
    }
  | {
      ok: false;
      kind: K;
      region: string;
      error: ScanError;
    };

/**
 * Resources collected per kind, in discovery order.
 */
export type ResourceCollections = {
  readonly [K in ResourceKind]: readonly ResourceByKind[K][];
};

/**
 * Result of one discovery run. Read-only once returned.
 */
export interface ScanSession {
  readonly regions: readonly string[];
  readonly kinds: readonly ResourceKind[];
  readonly collections: ResourceCollections;
  readonly errors: readonly ScanError[];
  /** True when an abort signal stopped discovery early. */
  readonly interrupted: boolean;
  readonly startedAt: string;
  readonly completedAt: string;
}

/**
 * Monthly cost totals per kind and overall, in USD.
 */
export interface CostSummary {
  byKind: Record<ResourceKind, number>;
  overallTotal: number;
}

/**
 * Resources matching the idle/waste predicates.
 */
export interface WasteReport {
  stoppedCompute: ComputeResource[];
  detachedVolumes: BlockVolumeResource[];
  unassociatedFloatingIPs: FloatingIpResource[];
  recommendations: string[];
}

/**
 * Overall outcome of an inventory run.
 *
 * - complete: every scan succeeded
 * - partial: one or more region scans failed and were skipped
 * - interrupted: an abort signal truncated discovery
 */
export type InventoryStatus = 'complete' | 'partial' | 'interrupted';

export interface InventoryResult {
  status: InventoryStatus;
  session: ScanSession;
  costSummary: CostSummary;
  waste: WasteReport;
}

export type ReportFormat = 'txt' | 'csv' | 'json';

/**
 * Per-kind unit prices. `fallback` applies to variants missing from `rates`.
 */
export interface KindPricing {
  rates: Readonly<Record<string, number>>;
  fallback: number;
}

export type PriceTable = Readonly<Record<ResourceKind, KindPricing>>;

/**
 * Partial price override as written in configuration.
 */
export type PricingOverride = Partial<Record<ResourceKind, Record<string, number>>>;

/**
 * Configuration loaded from SSM Parameter Store or a local YAML file.
 */
export interface Config {
  version: string;
  environment: string;
  /** "all", a comma-separated string or a list of region codes. */
  regions?: string | string[];
  /** "all" or kinds/service aliases (ec2, ebs, s3, eip, snapshots). */
  resource_kinds?: string | string[];
  settings?: {
    concurrency?: number;
    no_cost?: boolean;
    max_attempts?: number;
    profile?: string;
    [key: string]: unknown;
  };
  pricing?: PricingOverride;
  [key: string]: unknown;
}

/**
 * Resolved options for one inventory run.
 */
export interface InventoryOptions {
  /** "all" resolves through the provider's region listing. */
  regions: 'all' | string[];
  kinds: ResourceKind[];
  pricing: PriceTable;
  concurrency: number;
  profile?: string;
  maxAttempts?: number;
}
