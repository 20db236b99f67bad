import { writeFile, mkdir } from "fs/promises";
import { dirname, extname } from "node:path";
import type { RunReport } from "../modules/report";

/**
 * Save a run report as CSV (`.csv`) or JSON (anything else)
 * Creates directory if it doesn't exist
 */
export async function saveReport(report: RunReport, filepath: string): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });

  const content =
    extname(filepath).toLowerCase() === ".csv"
      ? report.toCSV()
      : JSON.stringify(report, null, 2);

  await writeFile(filepath, content, "utf-8");
}
