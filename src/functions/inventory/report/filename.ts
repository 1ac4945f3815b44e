/**
 * Report file naming and timestamp formatting. Timestamps use local time.
 */

import type { ReportFormat } from '@shared/types';

export const REPORT_FILE_PREFIX = 'cost_inventory_report';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * e.g. "2024-01-15 09:30:05"
 */
export function formatGeneratedOn(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * e.g. "20240115_093005"
 */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Pick the report file name. A supplied name gets the format's extension
 * appended unless it already ends with it.
 *
 * @example
 * resolveReportFilename('csv', 'audit');      // 'audit.csv'
 * resolveReportFilename('csv', 'audit.csv');  // 'audit.csv'
 * resolveReportFilename('json', undefined, now);
 * // 'cost_inventory_report_20240115_093005.json'
 */
export function resolveReportFilename(
  format: ReportFormat,
  output?: string,
  now: Date = new Date()
): string {
  const extension = `.${format}`;

  if (output) {
    return output.endsWith(extension) ? output : `${output}${extension}`;
  }

  return `${REPORT_FILE_PREFIX}_${formatFileTimestamp(now)}${extension}`;
}
