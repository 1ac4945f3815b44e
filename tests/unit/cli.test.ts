/**
 * Unit tests for cli.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { mockClient } from 'aws-sdk-client-mock';
import {
  EC2Client,
  DescribeInstancesCommand,
  DescribeVolumesCommand,
} from '@aws-sdk/client-ec2';
import { S3Client } from '@aws-sdk/client-s3';
import type { ClientFactory } from '@functions/inventory/core/clients';
import { providerError } from '../helpers/fixtures';

vi.mock('@shared/utils/logger', () => ({
  setupLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
  setGlobalLogLevel: vi.fn(),
}));

import { EXIT_CODES, run, VERSION } from '../../src/cli';

const r1 = new EC2Client({ region: 'r1' });
const r2 = new EC2Client({ region: 'r2' });
const r1Mock = mockClient(r1);
const r2Mock = mockClient(r2);
const s3 = new S3Client({ region: 'us-east-1' });

const clients: ClientFactory = {
  ec2: (region) => (region === 'r1' ? r1 : r2),
  s3: () => s3,
};

const NOW = new Date(2024, 0, 15, 9, 30, 5);

describe('cli run', () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];

  function deps(signal?: AbortSignal) {
    return {
      stdout: (text: string) => void stdout.push(text),
      stderr: (text: string) => void stderr.push(text),
      clients,
      signal,
      now: () => NOW,
    };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cost-inventory-cli-'));
    stdout = [];
    stderr = [];

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

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should exit 2 and still write the report when a region scan fails', async () => {
    const output = join(dir, 'report');

    const code = await run(
      [
        'scan',
        '--regions',
        'r1,r2',
        '--services',
        'ec2,ebs',
        '--format',
        'csv',
        '--output',
        output,
      ],
      deps()
    );

    expect(code).toBe(EXIT_CODES.partial);
    expect(stdout).toEqual([
      `Report saved to ${output}.csv\n`,
      'Total estimated monthly cost: $17.59\n',
    ]);
    expect(stderr).toEqual([]);

    const csv = await readFile(`${output}.csv`, 'utf8');
    expect(csv.split('\n').slice(0, 3)).toEqual([
      '# EC2 INSTANCES',
      'Instance ID,Type,State,Region,Monthly Cost,Name',
      'i-web,t3.micro,running,r1,7.59,N/A',
    ]);
  });

  it('should exit 0 and print the text report when every scan succeeds', async () => {
    const output = join(dir, 'report');

    const code = await run(
      ['--regions', 'r1', '--services', 'ec2,ebs', '--output', output],
      deps()
    );

    expect(code).toBe(EXIT_CODES.complete);
    expect(stdout).toHaveLength(3);
    expect(stdout[0].split('\n')[4]).toBe('Status: complete');
    expect(stdout[0].split('\n')[3]).toBe('Generated on: 2024-01-15 09:30:05');
    expect(stdout[1]).toBe(`Report saved to ${output}.txt\n`);
    expect(await readFile(`${output}.txt`, 'utf8')).toBe(stdout[0]);
  });

  it('should zero every cost with --no-cost', async () => {
    const code = await run(
      [
        '--regions',
        'r1',
        '--services',
        'ec2',
        '--no-cost',
        '--format',
        'json',
        '--output',
        join(dir, 'r'),
      ],
      deps()
    );

    expect(code).toBe(EXIT_CODES.complete);
    expect(stdout[1]).toBe('Total estimated monthly cost: $0.00\n');
  });

  it('should print nothing with --quiet', async () => {
    const code = await run(
      ['--regions', 'r1', '--services', 'ec2', '--quiet', '--output', join(dir, 'r')],
      deps()
    );

    expect(code).toBe(EXIT_CODES.complete);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([]);
  });

  it('should exit 1 on an unknown service', async () => {
    const code = await run(['--regions', 'r1', '--services', 'rds'], deps());

    expect(code).toBe(EXIT_CODES.failure);
    expect(stderr).toHaveLength(1);
    expect(stderr[0].startsWith('Error: Invalid services: rds. Valid services: ')).toBe(true);
    expect(r1Mock.calls()).toHaveLength(0);
  });

  it('should exit 1 on a missing config file', async () => {
    const missing = join(dir, 'absent.yaml');

    const code = await run(['--regions', 'r1', '--config', missing], deps());

    expect(code).toBe(EXIT_CODES.failure);
    expect(stderr[0].startsWith(`Error: Could not read config file ${missing}`)).toBe(true);
  });

  it('should reject an invalid concurrency value', async () => {
    const code = await run(['--concurrency', '0'], deps());

    expect(code).toBe(1);
    expect(stderr.join('')).toContain('Must be a positive integer.');
  });

  it('should reject an unsupported format', async () => {
    const code = await run(['--format', 'xml'], deps());

    expect(code).toBe(1);
    expect(r1Mock.calls()).toHaveLength(0);
  });

  it('should print the version', async () => {
    const code = await run(['--version'], deps());

    expect(code).toBe(0);
    expect(stdout).toEqual([`${VERSION}\n`]);
  });

  it('should exit 130 with a partial report when interrupted', async () => {
    const controller = new AbortController();
    controller.abort();
    const output = join(dir, 'report');

    const code = await run(
      ['--regions', 'r1,r2', '--services', 'ec2', '--format', 'json', '--output', output],
      deps(controller.signal)
    );

    expect(code).toBe(EXIT_CODES.interrupted);
    expect(stderr).toEqual(['Scan interrupted by user; report contains partial results.\n']);

    const report: unknown = JSON.parse(await readFile(`${output}.json`, 'utf8'));
    expect(report).toMatchObject({ metadata: { status: 'interrupted', interrupted: true } });
  });
});
