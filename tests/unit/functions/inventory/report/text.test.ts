/**
 * Unit tests for report/text.ts
 */

import { describe, it, expect } from 'vitest';
import { APPROXIMATE_SIZE_NOTE, renderTextReport } from '@functions/inventory/report/text';
import {
  blockVolumeResource,
  computeResource,
  objectStoreResource,
  resultOf,
  scanError,
  sessionOf,
} from '../../../../helpers/fixtures';

const GENERATED_AT = new Date(2024, 0, 15, 9, 30, 5);
const RULE = '='.repeat(80);

function sp(count: number): string {
  return ' '.repeat(count);
}

function partialResult() {
  return resultOf(
    sessionOf(
      [
        computeResource({ identifier: 'i-web', region: 'r1' }),
        blockVolumeResource({ identifier: 'vol-data', region: 'r1', lifecycleState: 'available' }),
      ],
      { regions: ['r1', 'r2'], kinds: ['compute', 'block-volume'], errors: [scanError()] }
    )
  );
}

describe('renderTextReport', () => {
  it('should open with the title, timestamp, status and regions', () => {
    const lines = renderTextReport(partialResult(), GENERATED_AT).split('\n');

    expect(lines.slice(0, 6)).toEqual([
      RULE,
      'CLOUD COST INVENTORY REPORT',
      RULE,
      'Generated on: 2024-01-15 09:30:05',
      'Status: partial',
      'Regions scanned: r1, r2',
    ]);
  });

  it('should list resource counts and per-kind costs rounded to cents', () => {
    const lines = renderTextReport(partialResult(), GENERATED_AT).split('\n');

    expect(lines).toContain('  EC2 Instances: 1');
    expect(lines).toContain('  EBS Volumes: 1');
    expect(lines).toContain('  S3 Buckets: 0');
    expect(lines).toContain('EC2 Monthly Cost: $7.59');
    expect(lines).toContain('EBS Monthly Cost: $10.00');
    expect(lines).toContain('S3 Monthly Cost: $0.00');
    expect(lines).toContain('TOTAL Monthly Cost: $17.59');
  });

  it('should render fixed-width tables for non-empty kinds only', () => {
    const lines = renderTextReport(partialResult(), GENERATED_AT).split('\n');

    expect(lines).toContain(
      [
        'Instance ID',
        sp(10),
        'Type',
        sp(12),
        'State',
        sp(8),
        'Region',
        sp(10),
        'Monthly Cost',
        sp(4),
        'Name',
      ].join('')
    );
    expect(lines).toContain(
      [
        'i-web',
        sp(16),
        't3.micro',
        sp(8),
        'running',
        sp(6),
        'r1',
        sp(14),
        '$7.59',
        sp(11),
        'web',
      ].join('')
    );
    expect(lines).toContain(
      [
        'vol-data',
        sp(13),
        'gp2',
        sp(8),
        '100',
        sp(10),
        'available',
        sp(4),
        'r1',
        sp(14),
        '$10.00',
        sp(10),
        'N/A',
      ].join('')
    );
    expect(lines).toContain('EC2 INSTANCES');
    expect(lines).toContain('EBS VOLUMES');
    expect(lines).not.toContain('S3 BUCKETS');
    expect(lines).not.toContain('ELASTIC IPS');
  });

  it('should list recommendations and scan errors', () => {
    const lines = renderTextReport(partialResult(), GENERATED_AT).split('\n');

    expect(lines).toContain('[WARNING] Found 1 unattached EBS volumes that may be costing money');
    expect(lines).toContain('SCAN ERRORS');
    expect(lines).toContain(
      '[UnauthorizedOperation] compute in r2: You are not authorized to perform this operation.'
    );
  });

  it('should end with the closing banner', () => {
    const report = renderTextReport(partialResult(), GENERATED_AT);

    expect(report.endsWith(`${RULE}\nEND OF REPORT\n${RULE}\n`)).toBe(true);
  });

  it('should note approximate bucket sizes when buckets were found', () => {
    const lines = renderTextReport(
      resultOf(sessionOf([objectStoreResource()])),
      GENERATED_AT
    ).split('\n');

    expect(lines).toContain('S3 BUCKETS');
    expect(lines).toContain(APPROXIMATE_SIZE_NOTE);
    expect(lines).toContain(
      ['logs-bucket', sp(20), 'eu-west-2', sp(7), '2.00', sp(12), '$0.05'].join('')
    );
  });

  it('should report a clean, complete scan', () => {
    const lines = renderTextReport(resultOf(sessionOf([computeResource()])), GENERATED_AT).split(
      '\n'
    );

    expect(lines).toContain('Status: complete');
    expect(lines).toContain('[SUCCESS] No obviously unused resources found');
    expect(lines).not.toContain('SCAN ERRORS');
    expect(lines).not.toContain(APPROXIMATE_SIZE_NOTE);
  });

  it('should flag an interrupted scan', () => {
    const lines = renderTextReport(
      resultOf(sessionOf([], { interrupted: true, regions: [] })),
      GENERATED_AT
    ).split('\n');

    expect(lines).toContain('Status: interrupted');
    expect(lines).toContain('Regions scanned: none');
    expect(lines).toContain('Scan was interrupted; results are incomplete.');
  });
});
