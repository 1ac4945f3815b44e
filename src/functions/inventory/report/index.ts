export { csvEscape, renderCsvReport } from './csv';
export { formatFileTimestamp, formatGeneratedOn, resolveReportFilename } from './filename';
export { buildJsonReport, renderJsonReport, type JsonReport } from './json';
export { APPROXIMATE_SIZE_NOTE, REPORT_TITLE, renderTextReport } from './text';
export {
  isReportFormat,
  renderReport,
  REPORT_FORMATS,
  writeReport,
  type RenderOptions,
  type WriteReportOptions,
  type WrittenReport,
} from './writer';
