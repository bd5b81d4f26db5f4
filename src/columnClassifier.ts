/**
 * Module: Column Classification
 * Purpose: Assign raw columns to canonical roles from their header label, with content
 * tie-breaks for identity and currency columns and a content fallback when no label matches.
 * Price and VAT-rate columns are only collected as numeric candidates here; the final
 * price pick belongs to the price resolver.
 */
import type { Cell, ColumnAssignment, Grid, GridRow, MandatoryRole } from "./types.js";
import { computeSampleSize, type ResolvedOptions } from "./config.js";
import { isBlankCell, isBlankRow, looksCurrencyCode, looksNumeric, sanitizeString } from "./sanitize.js";
import { ALIAS_TABLE, scoreGroup, scoreRoles, type AliasTable, type RoleScore } from "./semantics.js";

export interface PriceCandidate {
  index: number;
  header: string;
  priceScore: number;
  vatScore: number;
  netScore: number;
  grossScore: number;
}

export interface ColumnClassification {
  headers: string[];
  columns: ColumnAssignment[];
  mapping: Partial<Record<MandatoryRole, number>>;
  priceCandidates: PriceCandidate[];
  sampleRows: GridRow[];
}

const IDENTITY_ROLES: ReadonlyArray<MandatoryRole> = ["equipmentId", "sessionId", "currency"];

// eMI3 style EVSE ids: DE*ABC*E123456, NL-XYZ-E0001
const EVSE_ID_RE = /^[A-Z]{2}[*-]?[A-Z0-9]{3}[*-]?E[A-Z0-9*-]+$/i;
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const HYPHENATED_TOKEN_RE = /^[a-z0-9]+(?:-[a-z0-9]+){2,}$/i;

const NUMERIC_RATIO = 0.6;
const CONTENT_RATIO = 0.8;
const EPS = 1e-9;

const ratio = (values: Cell[], test: (v: Cell) => boolean): number =>
  values.length ? values.filter(test).length / values.length : 0;

const uniqueness = (values: Cell[]): number =>
  values.length ? new Set(values.map((v) => sanitizeString(v))).size / values.length : 0;

const looksSessionId = (v: Cell): boolean => {
  const s = sanitizeString(v);
  return UUID_RE.test(s) || (s.length > 10 && HYPHENATED_TOKEN_RE.test(s));
};

/**
 * Content tie-break among columns whose header scored equally for one role.
 * Currency prefers code-shaped values; identifiers prefer values that vary row to row.
 */
function contentScore(role: MandatoryRole, values: Cell[]): number {
  if (role === "currency") return ratio(values, looksCurrencyCode);
  return uniqueness(values);
}

/**
 * Best role for a header. When roles tie on the header alone (`Session price`), numeric
 * values settle it for price or VAT rate.
 */
function pickRole(scores: RoleScore[], vals: Cell[]): RoleScore | undefined {
  const top = scores[0];
  if (!top) return undefined;
  const tied = scores.filter((s) => Math.abs(s.score - top.score) <= EPS);
  if (tied.length > 1 && vals.length && ratio(vals, looksNumeric) >= NUMERIC_RATIO) {
    return tied.find((s) => s.role === "price" || s.role === "vatRate") ?? top;
  }
  return top;
}

/**
 * Classify every column of the grid relative to the detected header row.
 * Never fails: unmatched roles are absent from `mapping`.
 */
export function classifyColumns(
  grid: Grid,
  headerRow: number,
  options: Pick<ResolvedOptions, "mode" | "acceptThreshold">,
  table: AliasTable = ALIAS_TABLE
): ColumnClassification {
  const headerCells = grid[headerRow] ?? [];
  const dataRows = grid.slice(headerRow + 1).filter((r) => !isBlankRow(r));
  const sampleRows = dataRows.slice(0, computeSampleSize(dataRows.length, options.mode));
  const width = Math.max(headerCells.length, ...sampleRows.map((r) => r.length));

  const headers: string[] = [];
  const values: Cell[][] = [];
  for (let c = 0; c < width; c++) {
    headers.push(sanitizeString(headerCells[c]));
    const col: Cell[] = [];
    for (const r of sampleRows) {
      const v = r[c];
      if (v !== undefined && !isBlankCell(v)) col.push(v);
    }
    values.push(col);
  }

  const columns: ColumnAssignment[] = headers.map((header, index): ColumnAssignment => ({
    index,
    header,
    role: "unclassified",
    score: 0,
    source: "header",
  }));
  const bestRole = headers.map((h, index) => (h ? pickRole(scoreRoles(h, table), values[index]) : undefined));

  const mapping: Partial<Record<MandatoryRole, number>> = {};
  for (const role of IDENTITY_ROLES) {
    const contenders: number[] = [];
    bestRole.forEach((b, index) => {
      if (b && b.role === role && b.score >= options.acceptThreshold) contenders.push(index);
    });
    if (!contenders.length) continue;
    let winner = contenders[0];
    for (const index of contenders.slice(1)) {
      const a = bestRole[winner]?.score ?? 0;
      const b = bestRole[index]?.score ?? 0;
      if (b > a + EPS) {
        winner = index;
      } else if (Math.abs(b - a) <= EPS && contentScore(role, values[index]) > contentScore(role, values[winner]) + EPS) {
        winner = index;
      }
    }
    mapping[role] = winner;
    columns[winner] = { ...columns[winner], role, score: bestRole[winner]?.score ?? 0 };
  }

  const priceCandidates: PriceCandidate[] = [];
  bestRole.forEach((b, index) => {
    if (!b || b.score < options.acceptThreshold) return;
    if (b.role !== "price" && b.role !== "vatRate") return;
    const vals = values[index];
    if (!vals.length || ratio(vals, looksNumeric) < NUMERIC_RATIO) return;
    const header = headers[index];
    priceCandidates.push({
      index,
      header,
      priceScore: scoreGroup(header, "price", table),
      vatScore: scoreGroup(header, "vatRate", table),
      netScore: scoreGroup(header, "net", table),
      grossScore: scoreGroup(header, "gross", table),
    });
    columns[index] = { ...columns[index], role: b.role, score: b.score };
  });

  applyContentFallback(columns, values, mapping);

  return { headers, columns, mapping, priceCandidates, sampleRows };
}

/**
 * Claim still-unclassified columns for missing identity roles when their values carry a
 * recognizable shape (currency codes, eMI3 EVSE ids, session UUIDs).
 */
function applyContentFallback(
  columns: ColumnAssignment[],
  values: Cell[][],
  mapping: Partial<Record<MandatoryRole, number>>
): void {
  const tests: Array<{ role: MandatoryRole; test: (v: Cell) => boolean; minUnique: number }> = [
    { role: "currency", test: looksCurrencyCode, minUnique: 0 },
    { role: "equipmentId", test: (v) => EVSE_ID_RE.test(sanitizeString(v)), minUnique: 0 },
    { role: "sessionId", test: looksSessionId, minUnique: 0.9 },
  ];
  for (const { role, test, minUnique } of tests) {
    if (mapping[role] !== undefined) continue;
    let best: { index: number; score: number } | undefined;
    for (const col of columns) {
      if (col.role !== "unclassified") continue;
      const vals = values[col.index];
      if (!vals.length || uniqueness(vals) < minUnique) continue;
      const score = ratio(vals, test);
      if (score >= CONTENT_RATIO && (!best || score > best.score + EPS)) best = { index: col.index, score };
    }
    if (!best) continue;
    mapping[role] = best.index;
    columns[best.index] = { ...columns[best.index], role, score: best.score, source: "content" };
  }
}
