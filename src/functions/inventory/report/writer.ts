/**
 * Report rendering by format and writing to disk.
 */

import { writeFile } from 'node:fs/promises';
import type { InventoryResult, ReportFormat } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { renderCsvReport } from './csv';
import { resolveReportFilename } from './filename';
import { renderJsonReport } from './json';
import { renderTextReport } from './text';

const logger = setupLogger('cost-inventory:report');

export const REPORT_FORMATS: readonly ReportFormat[] = ['txt', 'csv', 'json'];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export interface RenderOptions {
  generatedAt?: Date;
  version: string;
}

export function renderReport(
  format: ReportFormat,
  result: InventoryResult,
  options: RenderOptions
): string {
  const generatedAt = options.generatedAt ?? new Date();

  switch (format) {
    case 'csv':
      return renderCsvReport(result);
    case 'json':
      return renderJsonReport(result, generatedAt, options.version);
    case 'txt':
      return renderTextReport(result, generatedAt);
  }
}

export interface WriteReportOptions extends RenderOptions {
  /** Target file name; the format's extension is appended when missing. */
  output?: string;
}

export interface WrittenReport {
  filename: string;
  content: string;
}

/**
 * Render the report and write it as UTF-8.
 *
 * @throws the file system error when the file cannot be written
 */
export async function writeReport(
  format: ReportFormat,
  result: InventoryResult,
  options: WriteReportOptions
): Promise<WrittenReport> {
  const generatedAt = options.generatedAt ?? new Date();
  const filename = resolveReportFilename(format, options.output, generatedAt);
  const content = renderReport(format, result, { ...options, generatedAt });

  await writeFile(filename, content, 'utf8');
  logger.info({ filename, format }, `Report saved to ${filename}`);

  return { filename, content };
}
