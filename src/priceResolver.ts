/**
 * Module: Net Price Resolution
 * Purpose: Pick the net unit price column among the numeric candidates produced by the
 * column classifier. Rules run in order and the first unique answer wins:
 * 1. exactly one header labelled net, not gross, and matching net aliases at least as well as VAT-rate ones
 * 2. VAT-rate columns are set aside: by header, or by content when the column neither
 *    carries a price label beside a labelled VAT column nor pairs as net with another
 * 3. a remaining column that relates to another as `gross = net × (1 + vat/100)`,
 *    or the only remaining column when it is not labelled gross and no price-labelled
 *    column was set aside as rates
 * Anything else fails as ambiguous; a gross column is never passed off as net.
 */
import type { GridRow, PriceRule, StageError } from "./types.js";
import type { ResolvedOptions } from "./config.js";
import type { PriceCandidate } from "./columnClassifier.js";
import { parseNumber } from "./sanitize.js";

export type PriceResolution =
  | { ok: true; column: number; rule: PriceRule; vatColumn?: number }
  | { ok: false; error: StageError; candidates: string[] };

// Standard and reduced rates in use across Europe and common EV charging markets
const KNOWN_VAT_RATES = new Set([
  0, 2.1, 2.5, 3, 3.7, 4, 5, 5.5, 6, 7, 7.7, 8, 8.1, 9, 10, 12, 13, 14, 15, 16, 17, 18, 19, 20, 21, 22, 23, 24, 25, 25.5, 27,
]);

const AGREEMENT_RATIO = 0.8;

const round2 = (n: number): number => Math.round(n * 100) / 100;
const hasAtMostTwoDecimals = (n: number): boolean => Math.abs(n * 100 - Math.round(n * 100)) < 1e-6;

interface CandidateView {
  candidate: PriceCandidate;
  values: Array<number | undefined>;
  net: boolean;
  gross: boolean;
  vatLabel: boolean;
  // best role by header is price rather than VAT rate
  priceLabel: boolean;
}

interface VatColumn {
  view: CandidateView;
  rates: Array<number | undefined>;
}

const quoteHeaders = (list: PriceCandidate[]): string =>
  list.map((c) => `"${c.header || `column ${c.index + 1}`}"`).join(", ");

const byIndex = (a: CandidateView, b: CandidateView): number => a.candidate.index - b.candidate.index;

/**
 * Read a candidate as VAT rates in percent, or `undefined` when its values are out of range.
 * Fractions (`0.21`) are accepted when every value is a known rate once scaled.
 */
function readRates(view: CandidateView): Array<number | undefined> | undefined {
  const present = view.values.filter((v): v is number => v !== undefined);
  if (!present.length) return undefined;
  const asFraction =
    present.every((v) => v >= 0 && v < 1) &&
    present.some((v) => v > 0) &&
    present.every((v) => KNOWN_VAT_RATES.has(round2(v * 100)));
  const rates = asFraction ? view.values.map((v) => (v === undefined ? undefined : round2(v * 100))) : view.values;
  const bounded = rates.every((v) => v === undefined || (v >= 0 && v <= 100 && hasAtMostTwoDecimals(v)));
  return bounded ? rates : undefined;
}

const headerSaysVat = (view: CandidateView): boolean =>
  view.vatLabel && !view.net && !view.gross && view.candidate.vatScore >= view.candidate.priceScore;

// Loosely labelled column whose every value is a known VAT rate
const looksLikeRates = (view: CandidateView, rates: Array<number | undefined>): boolean =>
  !view.net &&
  !view.gross &&
  view.candidate.priceScore < 0.95 &&
  rates.every((v) => v === undefined || KNOWN_VAT_RATES.has(round2(v)));

/**
 * Whether `net` and `gross` agree with `gross / net = 1 + rate/100` on enough sampled rows.
 * Tolerance is relative to the expected ratio.
 */
function matchesVatRatio(
  net: Array<number | undefined>,
  gross: Array<number | undefined>,
  rates: Array<number | undefined>,
  tolerance: number
): boolean {
  let comparable = 0;
  let agree = 0;
  for (let i = 0; i < net.length; i++) {
    const n = net[i];
    const g = gross[i];
    const r = rates[i];
    if (n === undefined || g === undefined || r === undefined || n === 0) continue;
    comparable++;
    const expected = 1 + r / 100;
    if (Math.abs(g / n - expected) <= tolerance * expected) agree++;
  }
  return comparable > 0 && agree / comparable >= AGREEMENT_RATIO;
}

export function resolvePrice(
  rows: ReadonlyArray<GridRow>,
  candidates: PriceCandidate[],
  options: Pick<ResolvedOptions, "acceptThreshold" | "vatRatioTolerance">
): PriceResolution {
  const t = options.acceptThreshold;
  const tolerance = options.vatRatioTolerance;
  const views: CandidateView[] = candidates.map((candidate) => ({
    candidate,
    values: rows.map((r) => parseNumber(r[candidate.index])),
    net: candidate.netScore >= t,
    gross: candidate.grossScore >= t,
    vatLabel: candidate.vatScore >= t,
    priceLabel: candidate.priceScore >= t && candidate.priceScore >= candidate.vatScore,
  }));
  const headers = candidates.map((c) => c.header);

  if (!views.length) {
    return {
      ok: false,
      error: { code: "E_AMBIGUOUS_PRICE", message: "No numeric price column found." },
      candidates: headers,
    };
  }

  const vatColumns: VatColumn[] = [];
  const byContent: VatColumn[] = [];
  const remaining: CandidateView[] = [];
  for (const view of views) {
    const rates = readRates(view);
    if (rates && headerSaysVat(view)) vatColumns.push({ view, rates });
    else if (rates && looksLikeRates(view, rates)) byContent.push({ view, rates });
    else remaining.push(view);
  }

  const setAside: CandidateView[] = [];
  const labelledVat = vatColumns.length > 0;
  for (const entry of byContent) {
    const { view } = entry;
    const sources = [...vatColumns.filter((v) => headerSaysVat(v.view)), ...byContent.filter((v) => v !== entry)];
    const pairsAsNet = views.some(
      (other) =>
        other !== view && sources.some((src) => src.view !== other && matchesVatRatio(view.values, other.values, src.rates, tolerance))
    );
    if ((view.priceLabel && labelledVat) || pairsAsNet) {
      remaining.push(view);
    } else {
      vatColumns.push(entry);
      if (view.priceLabel) setAside.push(view);
    }
  }
  remaining.sort(byIndex);
  vatColumns.sort((a, b) => byIndex(a.view, b.view));
  const comparableVat = vatColumns.some((v) => !v.view.priceLabel);

  // Net aliases such as "ex vat" also score on VAT-rate aliases; only a stronger VAT-rate match disqualifies
  const netOnly = views.filter((v) => v.net && !v.gross && !(v.vatLabel && v.candidate.vatScore > v.candidate.netScore));
  if (netOnly.length === 1) {
    const column = netOnly[0].candidate.index;
    const vatColumn = vatColumns.find((v) => v.view.candidate.index !== column)?.view.candidate.index;
    return { ok: true, column, rule: "net_label", vatColumn };
  }

  const ambiguous = (tied: CandidateView[]): PriceResolution => ({
    ok: false,
    error: {
      code: "E_AMBIGUOUS_PRICE",
      message: `Cannot tell the net price apart among ${quoteHeaders(tied.map((v) => v.candidate))}${
        comparableVat ? "" : " (no VAT-rate column to compare them with)"
      }.`,
    },
    candidates: tied.map((v) => v.candidate.header),
  });

  if (!remaining.length) {
    return {
      ok: false,
      error: {
        code: "E_AMBIGUOUS_PRICE",
        message: `No price column found; only VAT-rate columns: ${quoteHeaders(candidates)}.`,
      },
      candidates: headers,
    };
  }

  if (remaining.length === 1) {
    const only = remaining[0];
    if (only.gross && !only.net) {
      return {
        ok: false,
        error: {
          code: "E_AMBIGUOUS_PRICE",
          message: `Only a gross price column was found (${quoteHeaders([only.candidate])}); the net price cannot be taken from it.`,
        },
        candidates: headers,
      };
    }
    if (setAside.length) return ambiguous([...remaining, ...setAside].sort(byIndex));
    return { ok: true, column: only.candidate.index, rule: "single_candidate", vatColumn: vatColumns[0]?.view.candidate.index };
  }

  const nets = new Map<number, number>();
  for (const { view: vat, rates } of vatColumns) {
    for (const a of remaining) {
      for (const b of remaining) {
        if (a === b) continue;
        if (matchesVatRatio(a.values, b.values, rates, tolerance) && !nets.has(a.candidate.index)) {
          nets.set(a.candidate.index, vat.candidate.index);
        }
      }
    }
  }
  if (nets.size === 1) {
    const [[column, vatColumn]] = [...nets];
    return { ok: true, column, rule: "vat_ratio", vatColumn };
  }

  return ambiguous(nets.size > 1 ? remaining.filter((v) => nets.has(v.candidate.index)) : remaining);
}
