import * as XLSX from "xlsx";
import type { CanonicalRow, MergedOutput } from "./types.js";

export type OutputFormat = "csv" | "xlsx";

export const OUTPUT_HEADERS = ["evse_id", "session_id", "currency", "price"] as const;

const toSheet = (rows: ReadonlyArray<CanonicalRow>): XLSX.WorkSheet =>
  XLSX.utils.aoa_to_sheet([
    [...OUTPUT_HEADERS],
    ...rows.map((r) => [r.equipmentId, r.sessionId, r.currency, r.price]),
  ]);

/**
 * Serialize canonical rows with the fixed header `evse_id, session_id, currency, price`.
 * CSV is UTF-8 text with `\n` line ends; XLSX holds a single `Invoices` sheet.
 */
export function writeCanonicalTable(rows: ReadonlyArray<CanonicalRow>, format: OutputFormat = "csv"): Uint8Array {
  const sheet = toSheet(rows);
  if (format === "csv") {
    return new TextEncoder().encode(XLSX.utils.sheet_to_csv(sheet, { RS: "\n" }));
  }
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, "Invoices");
  const out: ArrayBuffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
  return new Uint8Array(out);
}

/** One display line per failed file, followed by skipped-row notes for successful files. */
export function formatFailures(merged: MergedOutput): string[] {
  const lines = merged.failures.map((f) => `[${f.stage}] ${f.reason}`);
  for (const file of merged.files) {
    if (file.status === "ok" && file.skippedRows > 0) {
      lines.push(`${file.fileName}: skipped ${file.skippedRows} row(s) with missing values.`);
    }
  }
  return lines;
}
