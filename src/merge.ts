import type {
  CanonicalRow,
  EngineOptions,
  FailureReport,
  FileSummary,
  GridSource,
  MergedOutput,
  NormalizationResult,
} from "./types.js";
import { ENGINE_VERSION } from "./types.js";
import { resolveOptions } from "./config.js";
import { normalizeGrid } from "./fileNormalizer.js";

/**
 * Concatenate per-file results in input order into one merged output.
 * Results must already be in input order; a failed file adds no rows and one failure report.
 */
export function combineResults(results: ReadonlyArray<NormalizationResult>): MergedOutput {
  const rows: CanonicalRow[] = [];
  const failures: FailureReport[] = [];
  const files: FileSummary[] = [];
  let skippedRows = 0;
  for (const result of results) {
    if (result.status === "ok") {
      rows.push(...result.rows);
      skippedRows += result.skippedRows;
      files.push({ fileName: result.fileName, status: "ok", rowCount: result.rows.length, skippedRows: result.skippedRows });
    } else {
      failures.push(result.failure);
      files.push({ fileName: result.fileName, status: "failed", rowCount: 0, skippedRows: 0, stage: result.failure.stage });
    }
  }
  return Object.freeze({
    rows: Object.freeze(rows),
    failures: Object.freeze(failures),
    files: Object.freeze(files),
    meta: {
      totalFiles: results.length,
      succeededFiles: results.length - failures.length,
      failedFiles: failures.length,
      totalRows: rows.length,
      skippedRows,
      engineVersion: ENGINE_VERSION,
    },
  });
}

/**
 * Normalize every decoded file independently and merge the results.
 * Always returns, even when every file fails.
 */
export function mergeGrids(sources: ReadonlyArray<GridSource>, options?: EngineOptions): MergedOutput {
  const opts = resolveOptions(options);
  return combineResults(sources.map((source) => normalizeGrid(source, opts)));
}
