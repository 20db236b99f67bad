/**
 * Module exports
 */

export { processOne, isCaught } from "./executor";
export type { ItemTask } from "./executor";
export { ReportLog, RUN_REPORT_COLUMNS } from "./report-log";
export type { ItemReport } from "./report-log";
export type { CoreColumn, CoreFields, LogEntry } from "./report-log";
export { RunReport } from "./report";
export type { RunRecord, ReportRow, ReportSummary } from "./report";
export { reportOutput } from "./report-output";
