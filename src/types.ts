/**
 * Module: Public Types & Engine Version
 * Purpose: Define the grid contract, canonical invoice row, per-file results and the
 * merged output, plus the engine version banner exposed in `meta` for diagnostics.
 */
export type Cell = string | number | null;
export type GridRow = ReadonlyArray<Cell>;
export type Grid = ReadonlyArray<GridRow>;

export type GridFormat = "csv" | "tsv" | "xlsx" | "xls" | "ods" | "unknown";

export interface GridSource {
  fileName: string;
  format: GridFormat;
  rows: Grid;
  sheetName?: string;
}

// Canonical representation of one charging session line
export interface CanonicalRow {
  equipmentId: string;
  sessionId: string;
  currency: string; // uppercased ISO-4217-like code
  price: number;    // net (pre-VAT) amount
}

export type ColumnRole =
  | "equipmentId"
  | "sessionId"
  | "currency"
  | "price"
  | "vatRate"
  | "unclassified";

export type AssignedRole = Exclude<ColumnRole, "unclassified">;
export type MandatoryRole = "equipmentId" | "sessionId" | "currency";

export interface HeaderCandidate {
  rowIndex: number;
  score: number;
  fill: number;
  textual: number;
  uniqueness: number;
  keywordHits: number;
}

export interface ColumnAssignment {
  index: number;
  header: string;
  role: ColumnRole;
  score: number;
  source: "header" | "content";
}

export type ColumnMapping = Readonly<Partial<Record<AssignedRole, number>>>;

export type AnalysisMode = "fast" | "deep";

export type FailureStage = "decode" | "header" | "classification" | "price";

export type FailureCode =
  | "E_DECODE"
  | "E_NO_HEADER"
  | "E_MISSING_FIELD"
  | "E_AMBIGUOUS_PRICE";

export interface StageError {
  code: FailureCode;
  message: string;
}

export interface FailureReport {
  fileName: string;
  stage: FailureStage;
  code: FailureCode;
  reason: string; // suitable for direct display
}

export type PriceRule = "net_label" | "vat_ratio" | "single_candidate";

export interface NormalizationMeta {
  headerRow: number;
  headerScore: number;
  columns: ColumnAssignment[];
  mapping: ColumnMapping;
  priceRule: PriceRule;
  vatColumn?: number;
  skipReasons: Record<string, number>; // issue code -> rows
  analysisMode: AnalysisMode;
  sampleSize: number;
  engineVersion: string;
}

export type NormalizationResult =
  | {
      status: "ok";
      fileName: string;
      rows: CanonicalRow[];
      dataRows: number;    // non-blank rows after the header row
      skippedRows: number; // data rows missing a mandatory field
      meta: NormalizationMeta;
    }
  | {
      status: "failed";
      fileName: string;
      failure: FailureReport;
    };

export interface FileSummary {
  fileName: string;
  status: "ok" | "failed";
  rowCount: number;
  skippedRows: number;
  stage?: FailureStage;
}

export interface MergedOutput {
  readonly rows: ReadonlyArray<CanonicalRow>;
  readonly failures: ReadonlyArray<FailureReport>;
  readonly files: ReadonlyArray<FileSummary>;
  readonly meta: {
    totalFiles: number;
    succeededFiles: number;
    failedFiles: number;
    totalRows: number;
    skippedRows: number;
    engineVersion: string;
  };
}

export type AliasGroup = "equipmentId" | "sessionId" | "currency" | "price" | "vatRate" | "net" | "gross";

export interface EngineOptions {
  mode?: AnalysisMode;
  headerScanRows?: number;
  minHeaderFill?: number;
  minHeaderText?: number;
  acceptThreshold?: number;
  vatRatioTolerance?: number;
  // Extra vendor labels appended to the built-in alias table
  aliases?: Partial<Record<AliasGroup, string[]>>;
}

export const ENGINE_VERSION = "0.1.0";
