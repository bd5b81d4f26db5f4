import * as XLSX from "xlsx";
import type { Cell } from "./types.js";

const PREFERRED_SHEET_RE = /invoice|session|cdr|charg|transaction|rechnung/i;

/**
 * Read a workbook (XLSX, XLS, ODS, or anything SheetJS recognizes) into a grid of raw cells.
 * - Chooses the main sheet (prefers invoice/session-like names, otherwise the first non-empty sheet).
 * - Keeps blank rows inside the used range; row 0 is the first row of that range.
 */
export function readWorkbookToGrid(bytes: Uint8Array): { rows: Cell[][]; sheetName?: string } {
  const workbook = XLSX.read(bytes, { type: "array" });
  const sheetName = chooseMainSheet(workbook);
  if (!sheetName) return { rows: [] };
  const sheet = workbook.Sheets[sheetName];
  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: true });
  return { rows: raw.map((row) => row.map(toCell)), sheetName };
}

/**
 * Select the primary sheet to read. Prefers a non-empty sheet whose name suggests invoice
 * lines, otherwise the first sheet with any content.
 */
function chooseMainSheet(workbook: XLSX.WorkBook): string | undefined {
  const nonEmpty = workbook.SheetNames.filter((name) => {
    const ref = workbook.Sheets[name]?.["!ref"];
    return ref !== undefined && ref !== "";
  });
  return nonEmpty.find((name) => PREFERRED_SHEET_RE.test(name)) ?? nonEmpty[0] ?? workbook.SheetNames[0];
}

function toCell(v: unknown): Cell {
  if (v === undefined || v === null) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string") return v;
  if (typeof v === "boolean") return v ? "TRUE" : "FALSE";
  if (v instanceof Date) return v.toISOString();
  return String(v);
}
