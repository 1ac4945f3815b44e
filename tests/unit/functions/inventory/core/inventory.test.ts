/**
 * Unit tests for core/inventory.ts
 *
 * Runs the real scanners against mocked per-region EC2 clients.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  EC2Client,
  DescribeInstancesCommand,
  DescribeVolumesCommand,
} from '@aws-sdk/client-ec2';
import { S3Client } from '@aws-sdk/client-s3';
import type { InventoryOptions } from '@shared/types';
import type { ClientFactory } from '@functions/inventory/core/clients';
import { DEFAULT_PRICE_TABLE, ZERO_PRICE_TABLE } from '@shared/pricing';
import { providerError, sessionOf, scanError } from '../../../../helpers/fixtures';

vi.mock('@shared/utils/logger', () => ({
  setupLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { InventoryError, inventoryStatus, runInventory } from '@functions/inventory/core/inventory';

const r1 = new EC2Client({ region: 'r1' });
const r2 = new EC2Client({ region: 'r2' });
const r1Mock = mockClient(r1);
const r2Mock = mockClient(r2);
const s3 = new S3Client({ region: 'us-east-1' });

const clients: ClientFactory = {
  ec2: (region) => (region === 'r1' ? r1 : r2),
  s3: () => s3,
};

function options(overrides: Partial<InventoryOptions> = {}): InventoryOptions {
  return {
    regions: ['r1', 'r2'],
    kinds: ['compute', 'block-volume'],
    pricing: DEFAULT_PRICE_TABLE,
    concurrency: 2,
    ...overrides,
  };
}

describe('runInventory', () => {
  beforeEach(() => {
    r1Mock.reset();
    r2Mock.reset();

    r1Mock.on(DescribeInstancesCommand).resolves({
      Reservations: [
        {
          Instances: [
            { InstanceId: 'i-web', InstanceType: 't3.micro', State: { Name: 'running' } },
          ],
        },
      ],
    });
    r1Mock.on(DescribeVolumesCommand).resolves({
      Volumes: [{ VolumeId: 'vol-data', VolumeType: 'gp2', Size: 100, State: 'available' }],
    });
    r2Mock
      .on(DescribeInstancesCommand)
      .rejects(providerError('UnauthorizedOperation', 'You are not authorized'));
    r2Mock.on(DescribeVolumesCommand).resolves({ Volumes: [] });
  });

  it('should complete a two-region scan with one failed region as partial', async () => {
    const result = await runInventory(options(), { clients });

    expect(result.status).toBe('partial');

    const { collections, errors } = result.session;
    expect(collections.compute).toHaveLength(1);
    expect(collections.compute[0]).toMatchObject({
      identifier: 'i-web',
      region: 'r1',
      monthlyCost: 7.592,
    });
    expect(collections['block-volume']).toHaveLength(1);
    expect(collections['block-volume'][0]).toMatchObject({
      identifier: 'vol-data',
      monthlyCost: 10,
    });

    expect(result.costSummary).toEqual({
      byKind: {
        compute: 7.592,
        'block-volume': 10,
        'object-store': 0,
        'floating-ip': 0,
        snapshot: 0,
      },
      overallTotal: 17.592,
    });

    expect(result.waste.detachedVolumes.map((v) => v.identifier)).toEqual(['vol-data']);
    expect(result.waste.stoppedCompute).toEqual([]);

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      kind: 'compute',
      region: 'r2',
      code: 'UnauthorizedOperation',
      recoverable: true,
    });
  });

  it('should report complete when every scan succeeds', async () => {
    const result = await runInventory(options({ regions: ['r1'] }), { clients });

    expect(result.status).toBe('complete');
    expect(result.session.errors).toEqual([]);
  });

  it('should total zero in no-cost mode', async () => {
    const result = await runInventory(options({ pricing: ZERO_PRICE_TABLE }), { clients });

    expect(result.costSummary.overallTotal).toBe(0);
    expect(result.session.collections.compute).toHaveLength(1);
  });

  it('should report interrupted when aborted before scanning', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runInventory(options(), { clients, signal: controller.signal });

    expect(result.status).toBe('interrupted');
    expect(result.session.collections.compute).toEqual([]);
    expect(result.session.errors).toEqual([]);
  });

  it('should wrap unexpected failures in InventoryError', async () => {
    const result = runInventory(options(), {
      clients,
      scannerFactory: () => {
        throw new Error('no scanner');
      },
    });

    await expect(result).rejects.toThrow(InventoryError);
    await expect(result).rejects.toThrow('Inventory failed: Error: no scanner');
  });

  it('should keep the original failure as the cause', async () => {
    const failure = new Error('no scanner');

    const error = await runInventory(options(), {
      clients,
      scannerFactory: () => {
        throw failure;
      },
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InventoryError);
    expect(error).toMatchObject({ name: 'InventoryError', cause: failure });
  });
});

describe('inventoryStatus', () => {
  it('should prefer interrupted over partial', () => {
    expect(inventoryStatus(sessionOf([], { interrupted: true, errors: [scanError()] }))).toBe(
      'interrupted'
    );
    expect(inventoryStatus(sessionOf([], { errors: [scanError()] }))).toBe('partial');
    expect(inventoryStatus(sessionOf([]))).toBe('complete');
  });
});
