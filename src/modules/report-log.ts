/**
 * Report Log
 * Per-run accumulator of item records, keyed by input path
 */

import { ReservedColumnError } from "../errors";

export const RUN_REPORT_COLUMNS = [
  "outpath",
  "skipped",
  "error",
  "timeFinished",
] as const;

export type CoreColumn = (typeof RUN_REPORT_COLUMNS)[number];

export interface CoreFields {
  outpath: string | null;
  skipped: boolean;
  error: string | null;
  timeFinished: Date;
}

export interface LogEntry extends Partial<CoreFields> {
  fields: Map<string, unknown>;
}

function isCoreColumn(key: string): key is CoreColumn {
  return (RUN_REPORT_COLUMNS as readonly string[]).includes(key);
}

/**
 * One item's record, as contextual stages see it
 * Writes land under the item's own input path only
 */
export interface ItemReport {
  readonly inpath: string;
  set(key: string, value: unknown): void;
  get(key: string): unknown;
}

/**
 * Shared by every item of one run. Each item only writes under its own
 * input path, so entries never contend.
 *
 * Contextual stages get an `ItemReport` from `forItem` and call `set` on it
 * to add fields that show up as extra run report columns.
 */
export class ReportLog {
  private entries = new Map<string, LogEntry>();
  private fieldOrder = new Set<string>();

  private entry(inpath: string): LogEntry {
    let entry = this.entries.get(inpath);
    if (!entry) {
      entry = { fields: new Map() };
      this.entries.set(inpath, entry);
    }
    return entry;
  }

  /** Write core fields for an item (executor only) */
  update(inpath: string, fields: Partial<CoreFields>): void {
    Object.assign(this.entry(inpath), fields);
  }

  /** Add an instrumented field to an item's record */
  set(inpath: string, key: string, value: unknown): void {
    if (isCoreColumn(key)) {
      throw new ReservedColumnError(key);
    }
    this.entry(inpath).fields.set(key, value);
    this.fieldOrder.add(key);
  }

  /** Handle bound to one item's record */
  forItem(inpath: string): ItemReport {
    return {
      inpath,
      set: (key, value) => this.set(inpath, key, value),
      get: (key) => this.get(inpath, key),
    };
  }

  get(inpath: string, key: string): unknown {
    return this.entries.get(inpath)?.fields.get(key);
  }

  has(inpath: string): boolean {
    return this.entries.has(inpath);
  }

  /** Extra field names in the order they were first written */
  get fieldNames(): string[] {
    return [...this.fieldOrder];
  }

  [Symbol.iterator](): IterableIterator<[string, LogEntry]> {
    return this.entries.entries();
  }
}
