import type { Grid, GridRow, HeaderCandidate, StageError } from "./types.js";
import type { ResolvedOptions } from "./config.js";
import { isBlankCell, looksNumeric, sanitizeString } from "./sanitize.js";
import { normalizeLabel, scoreRoles, type AliasTable, ALIAS_TABLE } from "./semantics.js";

export type HeaderDetection = { ok: true; header: HeaderCandidate } | { ok: false; error: StageError };

const WEIGHTS = { fill: 0.35, textual: 0.35, uniqueness: 0.15, keyword: 0.15 } as const;

/**
 * Width of the scanned window: the widest non-empty extent among the scanned rows.
 * Trailing blank cells never count against a row's fill.
 */
function scannedWidth(grid: Grid, limit: number): number {
  let width = 0;
  for (let r = 0; r < limit; r++) {
    const row = grid[r] ?? [];
    for (let c = row.length - 1; c >= 0; c--) {
      if (!isBlankCell(row[c])) {
        width = Math.max(width, c + 1);
        break;
      }
    }
  }
  return width;
}

/**
 * Score one row as a header candidate.
 * - fill: non-empty cells / window width
 * - textual: non-empty cells holding non-numeric text with at least one letter
 * - uniqueness: distinct normalized labels / non-empty cells
 * - keywordHits: cells that look like a known alias of any role
 */
export function scoreHeaderRow(
  row: GridRow | undefined,
  rowIndex: number,
  width: number,
  acceptThreshold: number,
  table: AliasTable = ALIAS_TABLE
): HeaderCandidate & { nonEmpty: number } {
  const cells = (row ?? []).slice(0, width);
  const labels: string[] = [];
  let textual = 0;
  let keyword = 0;
  for (const cell of cells) {
    if (cell === undefined || cell === null) continue;
    const s = sanitizeString(cell);
    if (!s) continue;
    labels.push(normalizeLabel(s) || s);
    if (typeof cell === "string" && !looksNumeric(cell) && /\p{L}/u.test(s)) textual++;
    const best = scoreRoles(s, table)[0];
    if (best && best.score >= acceptThreshold) keyword++;
  }
  const nonEmpty = labels.length;
  if (!nonEmpty || !width) {
    return { rowIndex, score: 0, fill: 0, textual: 0, uniqueness: 0, keywordHits: 0, nonEmpty: 0 };
  }
  const fill = nonEmpty / width;
  const textualRatio = textual / nonEmpty;
  const uniqueness = new Set(labels).size / nonEmpty;
  const keywordRatio = keyword / nonEmpty;
  const score =
    WEIGHTS.fill * fill + WEIGHTS.textual * textualRatio + WEIGHTS.uniqueness * uniqueness + WEIGHTS.keyword * keywordRatio;
  return { rowIndex, score, fill, textual: textualRatio, uniqueness, keywordHits: keyword, nonEmpty };
}

/**
 * Find the row most likely to hold the column headers among the first `headerScanRows` rows.
 * A row qualifies only with at least two labels, `fill ≥ minHeaderFill` and
 * `textual ≥ minHeaderText`; the best composite wins and ties go to the earliest row.
 * When nothing qualifies the detection fails; row 0 is never assumed.
 */
export function detectHeaderRow(
  grid: Grid,
  options: Pick<ResolvedOptions, "headerScanRows" | "minHeaderFill" | "minHeaderText" | "acceptThreshold">,
  table: AliasTable = ALIAS_TABLE
): HeaderDetection {
  const limit = Math.min(options.headerScanRows, grid.length);
  const width = scannedWidth(grid, limit);
  let best: HeaderCandidate | undefined;
  for (let r = 0; r < limit; r++) {
    const row = grid[r];
    if (!row || row.every((c) => isBlankCell(c))) continue;
    const { nonEmpty, ...candidate } = scoreHeaderRow(row, r, width, options.acceptThreshold, table);
    if (nonEmpty < 2) continue;
    if (candidate.fill < options.minHeaderFill || candidate.textual < options.minHeaderText) continue;
    if (!best || candidate.score > best.score) best = candidate;
  }
  if (!best) {
    return {
      ok: false,
      error: {
        code: "E_NO_HEADER",
        message:
          limit === 0
            ? "The sheet is empty."
            : `No header row found in the first ${limit} row(s): no row is mostly filled with text labels.`,
      },
    };
  }
  return { ok: true, header: best };
}
