import { parseCsvToGrid, decodeText } from "./csv.js";
import { readWorkbookToGrid } from "./xlsx.js";
import { normalizeGrid } from "./fileNormalizer.js";
import { combineResults, mergeGrids } from "./merge.js";
import { resolveOptions } from "./config.js";
import type { EngineOptions, GridFormat, GridSource, MergedOutput, NormalizationResult } from "./types.js";

export * from "./types.js";
export { detectHeaderRow } from "./headerDetector.js";
export { classifyColumns, type PriceCandidate, type ColumnClassification } from "./columnClassifier.js";
export { resolvePrice, type PriceResolution } from "./priceResolver.js";
export { ALIAS_TABLE, buildAliasTable } from "./semantics.js";
export { DEFAULT_OPTIONS, resolveOptions } from "./config.js";
export { writeCanonicalTable, formatFailures, OUTPUT_HEADERS, type OutputFormat } from "./serialize.js";
export { normalizeGrid, mergeGrids, combineResults };

/**
 * Module: Invoice Reconcile Entry Point
 * Purpose: Decode invoice exports (CSV/TSV/XLSX/XLS/ODS) from bytes, normalize each into
 * canonical `{ equipmentId, sessionId, currency, price }` rows and merge them in input order.
 * Notes:
 * - Accepts `ArrayBuffer | Uint8Array` so callers can pass upload buffers or `fs` reads.
 * - A file that cannot be decoded or normalized yields one failure report; the batch continues.
 */
export interface InvoiceFile {
  name: string;
  bytes: ArrayBuffer | Uint8Array;
}

const TEXT_FORMATS: Record<string, GridFormat> = { csv: "csv", tsv: "tsv", txt: "csv" };
const WORKBOOK_FORMATS: Record<string, GridFormat> = { xlsx: "xlsx", xlsm: "xlsx", xls: "xls", ods: "ods" };

export function detectFormat(fileName: string): GridFormat {
  const ext = fileName.toLowerCase().split(".").pop() ?? "";
  return TEXT_FORMATS[ext] ?? WORKBOOK_FORMATS[ext] ?? "unknown";
}

/**
 * Decode one file into a grid. Delimited text goes through the CSV parser (delimiter sniffed,
 * `\t` forced for `.tsv`); everything else is handed to SheetJS. Throws when the bytes
 * cannot be read as either.
 */
export function decodeGrid(bytes: ArrayBuffer | Uint8Array, fileName: string): GridSource {
  const data = bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes);
  const format = detectFormat(fileName);
  if (format === "csv" || format === "tsv") {
    const text = decodeText(data);
    return { fileName, format, rows: parseCsvToGrid(text, format === "tsv" ? "\t" : undefined) };
  }
  const { rows, sheetName } = readWorkbookToGrid(data);
  return { fileName, format, rows, sheetName };
}

/**
 * Decode and normalize one invoice file. Decoding errors become a `decode` failure.
 */
export function parseInvoiceFile(file: InvoiceFile, options?: EngineOptions): NormalizationResult {
  let source: GridSource;
  try {
    source = decodeGrid(file.bytes, file.name);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      status: "failed",
      fileName: file.name,
      failure: {
        fileName: file.name,
        stage: "decode",
        code: "E_DECODE",
        reason: `${file.name}: The file could not be read (${message}).`,
      },
    };
  }
  return normalizeGrid(source, options);
}

/**
 * Decode, normalize and merge a batch of invoice files.
 * Files are processed independently, one after another; rows keep input order.
 */
export function combineInvoiceFiles(files: ReadonlyArray<InvoiceFile>, options?: EngineOptions): MergedOutput {
  const opts = resolveOptions(options);
  return combineResults(files.map((file) => parseInvoiceFile(file, opts)));
}
