/**
 * CSV report: one section per kind, then a cost summary.
 */

import type { InventoryResult } from '@shared/types';
import { formatCurrency } from '@shared/utils/money';
import { KIND_COST_LABELS, KIND_TITLES, kindTable, tableRows } from './columns';

/**
 * Quote a field containing a comma, quote or line break.
 */
export function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function csvLine(cells: readonly string[]): string {
  return cells.map(csvEscape).join(',');
}

/**
 * Render the CSV report for the kinds that were scanned.
 */
export function renderCsvReport(result: InventoryResult): string {
  const { session, costSummary } = result;
  const sections: string[] = [];

  for (const kind of session.kinds) {
    const { columns, resources } = kindTable(kind, session.collections);
    sections.push(`# ${KIND_TITLES[kind]}`);
    sections.push(...tableRows(columns, resources).map(csvLine));
    sections.push('');
  }

  sections.push('# COST SUMMARY');
  sections.push(csvLine(['Kind', 'Monthly Cost']));
  for (const kind of session.kinds) {
    sections.push(csvLine([KIND_COST_LABELS[kind], formatCurrency(costSummary.byKind[kind])]));
  }
  sections.push(csvLine(['TOTAL', formatCurrency(costSummary.overallTotal)]));

  return `${sections.join('\n')}\n`;
}
