export { buildReports, reportSlug } from './reportTables.js';
export type { BuildReportsOptions } from './reportTables.js';
export { getExportDir, reportFileName, uniquePrefix, toCsv, writeReports, combineReports } from './csvExporter.js';
