/**
 * Plain-text report with fixed-width tables.
 */

import type { InventoryResult } from '@shared/types';
import { RESOURCE_KINDS } from '@shared/types';
import { formatCurrency } from '@shared/utils/money';
import {
  KIND_COST_LABELS,
  KIND_COUNT_LABELS,
  KIND_TITLES,
  kindTable,
  type Column,
} from './columns';
import { formatGeneratedOn } from './filename';

const RULE = '='.repeat(80);
const SECTION_RULE = '-'.repeat(20);
const TABLE_RULE = '-'.repeat(100);

export const REPORT_TITLE = 'CLOUD COST INVENTORY REPORT';

export const APPROXIMATE_SIZE_NOTE =
  'S3 bucket sizes count only the first page of objects and may be understated.';

function section(title: string): string[] {
  return [title, SECTION_RULE];
}

function fixedWidthLine<R>(columns: readonly Column<R>[], cells: readonly string[]): string {
  return cells
    .map((cell, index) => cell.padEnd(columns[index]?.width ?? 0))
    .join(' ')
    .trimEnd();
}

function formatTable<R>(columns: readonly Column<R>[], resources: readonly R[]): string[] {
  const lines = [
    fixedWidthLine(columns, columns.map((column) => column.header)),
    TABLE_RULE,
  ];

  for (const resource of resources) {
    const cells = columns.map(
      (column) => `${column.currency ? '$' : ''}${column.value(resource)}`
    );
    lines.push(fixedWidthLine(columns, cells));
  }

  return lines;
}

/**
 * Render the text report. Lines end with "\n"; trailing spaces are trimmed.
 */
export function renderTextReport(result: InventoryResult, generatedAt: Date = new Date()): string {
  const { session, costSummary, waste } = result;
  const lines: string[] = [RULE, REPORT_TITLE, RULE];

  lines.push(`Generated on: ${formatGeneratedOn(generatedAt)}`);
  lines.push(`Status: ${result.status}`);
  const regions = session.regions.length > 0 ? session.regions.join(', ') : 'none';
  lines.push(`Regions scanned: ${regions}`);
  if (session.interrupted) {
    lines.push('Scan was interrupted; results are incomplete.');
  }
  lines.push('');

  lines.push(...section('SUMMARY'), 'Total Resources Found:');
  for (const kind of RESOURCE_KINDS) {
    lines.push(`  ${KIND_COUNT_LABELS[kind]}: ${session.collections[kind].length}`);
  }
  lines.push('');

  lines.push(...section('COST SUMMARY'));
  for (const kind of RESOURCE_KINDS) {
    const cost = formatCurrency(costSummary.byKind[kind]);
    lines.push(`${KIND_COST_LABELS[kind]} Monthly Cost: $${cost}`);
  }
  lines.push(`TOTAL Monthly Cost: $${formatCurrency(costSummary.overallTotal)}`);
  lines.push('');

  for (const kind of RESOURCE_KINDS) {
    const { columns, resources } = kindTable(kind, session.collections);
    if (resources.length === 0) {
      continue;
    }
    lines.push(...section(KIND_TITLES[kind]), ...formatTable(columns, resources), '');
  }

  const wasteCount =
    waste.stoppedCompute.length +
    waste.detachedVolumes.length +
    waste.unassociatedFloatingIPs.length;
  const foundWaste = wasteCount > 0;
  lines.push(...section('RECOMMENDATIONS'));
  for (const recommendation of waste.recommendations) {
    lines.push(`${foundWaste ? '[WARNING]' : '[SUCCESS]'} ${recommendation}`);
  }
  lines.push('');

  if (session.errors.length > 0) {
    lines.push(...section('SCAN ERRORS'));
    for (const error of session.errors) {
      lines.push(`[${error.code}] ${error.kind} in ${error.region}: ${error.message}`);
    }
    lines.push('');
  }

  if (session.collections['object-store'].length > 0) {
    lines.push(...section('NOTES'), APPROXIMATE_SIZE_NOTE, '');
  }

  lines.push(RULE, 'END OF REPORT', RULE);
  return `${lines.join('\n')}\n`;
}
