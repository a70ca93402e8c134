// Report generator abstraction layer
export type { ReportGenerator, ReportKind } from './ReportGenerator.js';
export { CommandReportGenerator, parseCommandLine } from './CommandReportGenerator.js';
export { LedgerReportGenerator } from './LedgerReportGenerator.js';
export { createReportGenerators, type ReportGenerators } from './createReportGenerators.js';
