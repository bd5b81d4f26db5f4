/**
 * Module: File Normalizer
 * Purpose: Run header detection, column classification and price resolution for one decoded
 * file and project its data rows into canonical invoice rows.
 * Stages: `header → classification → price → done`; the first failing stage ends the run
 * with a failure report naming that stage. Rows missing a mandatory value are skipped and
 * counted, never reported as failures.
 */
import type {
  CanonicalRow,
  ColumnMapping,
  EngineOptions,
  FailureReport,
  FailureStage,
  GridSource,
  MandatoryRole,
  NormalizationResult,
  StageError,
} from "./types.js";
import { ENGINE_VERSION } from "./types.js";
import { resolveOptions } from "./config.js";
import { detectHeaderRow } from "./headerDetector.js";
import { classifyColumns } from "./columnClassifier.js";
import { resolvePrice } from "./priceResolver.js";
import { buildAliasTable } from "./semantics.js";
import { isBlankRow, sanitizeCurrency, sanitizeIdentifier, sanitizePrice, type Issue } from "./sanitize.js";

const MANDATORY_ROLES: ReadonlyArray<MandatoryRole> = ["equipmentId", "sessionId", "currency"];

const ROLE_LABELS: Record<MandatoryRole, string> = {
  equipmentId: "EVSE / equipment id",
  sessionId: "session id",
  currency: "currency",
};

const fail = (fileName: string, stage: FailureStage, error: StageError): NormalizationResult => {
  const failure: FailureReport = {
    fileName,
    stage,
    code: error.code,
    reason: `${fileName}: ${error.message}`,
  };
  return { status: "failed", fileName, failure };
};

/**
 * Normalize one decoded file. Pure with respect to its input: the same grid and options
 * always produce the same rows and the same failure report.
 */
export function normalizeGrid(source: GridSource, options?: EngineOptions): NormalizationResult {
  const opts = resolveOptions(options);
  const table = buildAliasTable(opts.aliases);
  const { fileName, rows: grid } = source;

  const header = detectHeaderRow(grid, opts, table);
  if (!header.ok) return fail(fileName, "header", header.error);
  const headerRow = header.header.rowIndex;

  const classification = classifyColumns(grid, headerRow, opts, table);
  const { equipmentId: equipmentCol, sessionId: sessionCol, currency: currencyCol } = classification.mapping;
  if (equipmentCol === undefined || sessionCol === undefined || currencyCol === undefined) {
    const missing = MANDATORY_ROLES.filter((role) => classification.mapping[role] === undefined);
    return fail(fileName, "classification", {
      code: "E_MISSING_FIELD",
      message: `Missing mandatory column(s): ${missing.map((r) => ROLE_LABELS[r]).join(", ")}.`,
    });
  }

  const price = resolvePrice(classification.sampleRows, classification.priceCandidates, opts);
  if (!price.ok) return fail(fileName, "price", price.error);

  const columns = classification.columns.map((c) => {
    if (c.index === price.column) return { ...c, role: "price" as const };
    if (c.index === price.vatColumn) return { ...c, role: "vatRate" as const };
    if (c.role === "price" || c.role === "vatRate") return { ...c, role: "unclassified" as const };
    return c;
  });
  const mapping: ColumnMapping = Object.freeze({
    equipmentId: equipmentCol,
    sessionId: sessionCol,
    currency: currencyCol,
    price: price.column,
    ...(price.vatColumn !== undefined ? { vatRate: price.vatColumn } : {}),
  });

  const out: CanonicalRow[] = [];
  const skipReasons: Record<string, number> = {};
  let dataRows = 0;
  let skippedRows = 0;
  for (let r = headerRow + 1; r < grid.length; r++) {
    const row = grid[r];
    if (isBlankRow(row)) continue;
    dataRows++;
    const equipmentId = sanitizeIdentifier(row[equipmentCol], "equipmentId");
    const sessionId = sanitizeIdentifier(row[sessionCol], "sessionId");
    const currency = sanitizeCurrency(row[currencyCol]);
    const net = sanitizePrice(row[price.column]);
    if (
      equipmentId.value === undefined ||
      sessionId.value === undefined ||
      currency.value === undefined ||
      net.value === undefined
    ) {
      skippedRows++;
      const issues: Issue[] = [...equipmentId.issues, ...sessionId.issues, ...currency.issues, ...net.issues];
      for (const issue of issues) {
        if (issue.level === "error") skipReasons[issue.code] = (skipReasons[issue.code] ?? 0) + 1;
      }
      continue;
    }
    out.push({ equipmentId: equipmentId.value, sessionId: sessionId.value, currency: currency.value, price: net.value });
  }

  return {
    status: "ok",
    fileName,
    rows: out,
    dataRows,
    skippedRows,
    meta: {
      headerRow,
      headerScore: header.header.score,
      columns,
      mapping,
      priceRule: price.rule,
      vatColumn: price.vatColumn,
      skipReasons,
      analysisMode: opts.mode,
      sampleSize: classification.sampleRows.length,
      engineVersion: ENGINE_VERSION,
    },
  };
}
