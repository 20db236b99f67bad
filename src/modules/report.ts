/**
 * Run Report
 * Table of per-item outcomes for one pipeline run, indexed by input path
 */

import { RUN_REPORT_COLUMNS, type CoreFields, type ReportLog } from "./report-log";

export interface RunRecord extends CoreFields {
  [field: string]: unknown;
}

export type ReportRow = { inpath: string } & RunRecord;

export interface ReportSummary {
  total: number;
  processed: number;
  skipped: number;
  failed: number;
}

// ============================================================================
// CSV Helpers
// ============================================================================

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function escapeCell(cell: string): string {
  if (/[",\r\n]/.test(cell)) {
    return `"${cell.replace(/"/g, '""')}"`;
  }
  return cell;
}

// ============================================================================
// RunReport
// ============================================================================

export class RunReport {
  private constructor(
    private records: Map<string, RunRecord>,
    readonly columns: readonly string[],
  ) {}

  /**
   * Build a report from a finished run's log
   *
   * Columns are the core columns followed by instrumented fields in the
   * order they were first written. Fields an item never wrote are null,
   * and `skipped` defaults to false.
   */
  static fromLog(log: ReportLog, finishedAt: Date = new Date()): RunReport {
    const extras = log.fieldNames;
    const records = new Map<string, RunRecord>();

    for (const [inpath, entry] of log) {
      const record: RunRecord = {
        outpath: entry.outpath ?? null,
        skipped: entry.skipped ?? false,
        error: entry.error ?? null,
        timeFinished: entry.timeFinished ?? finishedAt,
      };
      for (const key of extras) {
        record[key] = entry.fields.has(key) ? entry.fields.get(key) : null;
      }
      records.set(inpath, record);
    }

    return new RunReport(records, [...RUN_REPORT_COLUMNS, ...extras]);
  }

  get size(): number {
    return this.records.size;
  }

  /** Input paths, in the order items were first recorded */
  get index(): string[] {
    return [...this.records.keys()];
  }

  get(inpath: string): RunRecord | undefined {
    return this.records.get(inpath);
  }

  has(inpath: string): boolean {
    return this.records.has(inpath);
  }

  column(name: string): Map<string, unknown> {
    if (!this.columns.includes(name)) {
      throw new RangeError(`Unknown run report column: ${name}`);
    }
    const values = new Map<string, unknown>();
    for (const [inpath, record] of this.records) {
      values.set(inpath, record[name]);
    }
    return values;
  }

  rows(): ReportRow[] {
    return [...this.records].map(([inpath, record]) => ({ inpath, ...record }));
  }

  summary(): ReportSummary {
    const summary: ReportSummary = {
      total: this.records.size,
      processed: 0,
      skipped: 0,
      failed: 0,
    };
    for (const record of this.records.values()) {
      if (record.skipped) {
        summary.skipped++;
      } else if (record.error !== null) {
        summary.failed++;
      } else {
        summary.processed++;
      }
    }
    return summary;
  }

  toJSON(): ReportRow[] {
    return this.rows();
  }

  toCSV(): string {
    const header = ["inpath", ...this.columns];
    const lines = [header.map(escapeCell).join(",")];
    for (const [inpath, record] of this.records) {
      const cells = [inpath, ...this.columns.map((c) => formatCell(record[c]))];
      lines.push(cells.map(escapeCell).join(","));
    }
    return lines.join("\n") + "\n";
  }
}
