import type { AliasGroup, AnalysisMode, EngineOptions } from "./types.js";

export interface ResolvedOptions {
  mode: AnalysisMode;
  headerScanRows: number;
  minHeaderFill: number;
  minHeaderText: number;
  acceptThreshold: number;
  vatRatioTolerance: number;
  aliases: Partial<Record<AliasGroup, string[]>>;
}

export const DEFAULT_OPTIONS: Readonly<ResolvedOptions> = Object.freeze({
  mode: "fast",
  headerScanRows: 20,
  minHeaderFill: 0.5,
  minHeaderText: 0.5,
  acceptThreshold: 0.6,
  // Relative tolerance for gross / net ≈ 1 + vat/100
  vatRatioTolerance: 0.01,
  aliases: {},
});

/**
 * Merge caller options over the defaults. Out-of-range numbers fall back to the default
 * so a bad option never disables a stage.
 */
export function resolveOptions(options?: EngineOptions): ResolvedOptions {
  const pick = (value: number | undefined, fallback: number, min: number, max: number): number =>
    value !== undefined && Number.isFinite(value) && value >= min && value <= max ? value : fallback;
  return {
    mode: options?.mode ?? DEFAULT_OPTIONS.mode,
    headerScanRows: Math.floor(pick(options?.headerScanRows, DEFAULT_OPTIONS.headerScanRows, 1, 1000)),
    minHeaderFill: pick(options?.minHeaderFill, DEFAULT_OPTIONS.minHeaderFill, 0, 1),
    minHeaderText: pick(options?.minHeaderText, DEFAULT_OPTIONS.minHeaderText, 0, 1),
    acceptThreshold: pick(options?.acceptThreshold, DEFAULT_OPTIONS.acceptThreshold, 0.01, 1),
    vatRatioTolerance: pick(options?.vatRatioTolerance, DEFAULT_OPTIONS.vatRatioTolerance, 0, 0.5),
    aliases: options?.aliases ?? DEFAULT_OPTIONS.aliases,
  };
}

/**
 * Number of data rows inspected by the content heuristics.
 * `fast` looks at the first 32 rows; `deep` at a quarter of the file, clamped to 64..256.
 */
export function computeSampleSize(total: number, mode: AnalysisMode): number {
  if (mode === "fast") return Math.min(32, total);
  const byFraction = Math.ceil(total * 0.25);
  return Math.min(total, Math.min(256, Math.max(64, byFraction)));
}
