/**
 * Builders for canonical resources, scan sessions and inventory results.
 */

import type { Context } from 'aws-lambda';
import type {
  BlockVolumeResource,
  CanonicalResource,
  ComputeResource,
  FloatingIpResource,
  InventoryResult,
  ObjectStoreResource,
  ResourceKind,
  ScanError,
  ScanSession,
  SnapshotResource,
} from '@shared/types';
import { RESOURCE_KINDS } from '@shared/types';
import { ofKind } from '@shared/utils/kinds';
import { aggregateCosts } from '@functions/inventory/analysis/costAggregator';
import { classifyWaste } from '@functions/inventory/analysis/wasteClassifier';
import { inventoryStatus } from '@functions/inventory/core/inventory';

export function computeResource(overrides: Partial<ComputeResource> = {}): ComputeResource {
  return {
    kind: 'compute',
    identifier: 'i-0001',
    region: 'us-east-1',
    monthlyCost: 7.592,
    displayName: 'web',
    tags: { Name: 'web' },
    instanceType: 't3.micro',
    lifecycleState: 'running',
    publicAddress: 'N/A',
    privateAddress: '10.0.0.5',
    launchTimestamp: '2024-01-01T00:00:00.000Z',
    runningHours: 12,
    networkId: 'vpc-1',
    subnetId: 'subnet-1',
    hourlyRate: 0.0104,
    ...overrides,
  };
}

export function blockVolumeResource(
  overrides: Partial<BlockVolumeResource> = {}
): BlockVolumeResource {
  return {
    kind: 'block-volume',
    identifier: 'vol-0001',
    region: 'us-east-1',
    monthlyCost: 10,
    displayName: 'N/A',
    tags: {},
    variant: 'gp2',
    sizeGiB: 100,
    lifecycleState: 'in-use',
    encrypted: false,
    iops: 300,
    throughput: null,
    createTimestamp: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function objectStoreResource(
  overrides: Partial<ObjectStoreResource> = {}
): ObjectStoreResource {
  return {
    kind: 'object-store',
    identifier: 'logs-bucket',
    region: 'eu-west-2',
    monthlyCost: 0.046,
    displayName: 'logs-bucket',
    tags: {},
    sizeGiB: 2,
    sizeIsApproximate: true,
    createTimestamp: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function floatingIpResource(
  overrides: Partial<FloatingIpResource> = {}
): FloatingIpResource {
  return {
    kind: 'floating-ip',
    identifier: '203.0.113.10',
    region: 'us-east-1',
    monthlyCost: 3.65,
    displayName: 'N/A',
    tags: {},
    associated: false,
    domain: 'vpc',
    allocationId: 'eipalloc-1',
    instanceId: 'N/A',
    networkInterfaceId: 'N/A',
    hourlyRate: 0.005,
    ...overrides,
  };
}

export function snapshotResource(overrides: Partial<SnapshotResource> = {}): SnapshotResource {
  return {
    kind: 'snapshot',
    identifier: 'snap-0001',
    region: 'us-east-1',
    monthlyCost: 1,
    displayName: 'N/A',
    tags: {},
    sourceVolumeId: 'vol-0001',
    sizeGiB: 20,
    lifecycleState: 'completed',
    description: 'N/A',
    startTimestamp: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export interface SessionOverrides {
  regions?: string[];
  kinds?: ResourceKind[];
  errors?: ScanError[];
  interrupted?: boolean;
}

/**
 * Build a session holding the given resources, grouped by kind in order.
 */
export function sessionOf(
  resources: readonly CanonicalResource[],
  overrides: SessionOverrides = {}
): ScanSession {
  return {
    regions: overrides.regions ?? ['us-east-1'],
    kinds: overrides.kinds ?? [...RESOURCE_KINDS],
    collections: {
      compute: ofKind(resources, 'compute'),
      'block-volume': ofKind(resources, 'block-volume'),
      'object-store': ofKind(resources, 'object-store'),
      'floating-ip': ofKind(resources, 'floating-ip'),
      snapshot: ofKind(resources, 'snapshot'),
    },
    errors: overrides.errors ?? [],
    interrupted: overrides.interrupted ?? false,
    startedAt: '2024-01-15T09:30:00.000Z',
    completedAt: '2024-01-15T09:30:05.000Z',
  };
}

export function resultOf(session: ScanSession): InventoryResult {
  return {
    status: inventoryStatus(session),
    session,
    costSummary: aggregateCosts(session),
    waste: classifyWaste(session),
  };
}

export function scanError(overrides: Partial<ScanError> = {}): ScanError {
  return {
    kind: 'compute',
    region: 'r2',
    code: 'UnauthorizedOperation',
    message: 'You are not authorized to perform this operation.',
    recoverable: true,
    timestamp: '2024-01-15T09:30:01.000Z',
    ...overrides,
  };
}

/**
 * Error shaped like an AWS SDK service exception.
 */
export function providerError(name: string, message = `${name} error`): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

export function lambdaContext(requestId = 'req-0001'): Context {
  return {
    callbackWaitsForEmptyEventLoop: false,
    functionName: 'cost-inventory',
    functionVersion: '$LATEST',
    invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:cost-inventory',
    memoryLimitInMB: '256',
    awsRequestId: requestId,
    logGroupName: '/aws/lambda/cost-inventory',
    logStreamName: '2024/01/15/[$LATEST]abcdef',
    getRemainingTimeInMillis: () => 30000,
    done: () => undefined,
    fail: () => undefined,
    succeed: () => undefined,
  };
}
