/**
 * Module: Cell Sanitizers
 * Purpose: Normalize loosely-typed grid cells into canonical field values.
 * Features:
 * - Whitespace/NBSP cleanup shared by every stage.
 * - Locale-tolerant number parsing (`1,234.56`, `1.234,56`, `10,50`, `€ 10.50`).
 * - Currency codes and symbols mapped to uppercased ISO-4217-like codes.
 * Sanitizers return `{ value?, issues }`; a missing value means the cell is unusable.
 */
import type { Cell } from "./types.js";
import currencyCodes from "./data/currencyCodes.json" with { type: "json" };

export type IssueLevel = "error" | "warn";
export type Issue = { field: string; code: string; msg: string; level: IssueLevel };

export const sanitizeString = (input: unknown): string =>
  String(input ?? "")
    .replace(/\u00A0/g, " ")
    .replace(/[\r\n]+/g, " ")
    .replace(/\s+/g, " ")
    .normalize("NFC")
    .trim();

export const isBlankCell = (v: Cell | undefined): boolean => v === undefined || v === null || sanitizeString(v) === "";

export const isBlankRow = (row: ReadonlyArray<Cell> | undefined): boolean => !row || row.every((v) => isBlankCell(v));

const CURRENCY_SYMBOLS: Record<string, string> = {
  "€": "EUR",
  "$": "USD",
  "us$": "USD",
  "£": "GBP",
  "¥": "JPY",
  "₹": "INR",
  "₽": "RUB",
  "₩": "KRW",
  "zł": "PLN",
  "kč": "CZK",
  "ft": "HUF",
};

const CURRENCY_WORDS: Record<string, string> = {
  euro: "EUR",
  euros: "EUR",
  dollar: "USD",
  dollars: "USD",
  pound: "GBP",
  pounds: "GBP",
};

// ISO 4217 codes in circulation
const CURRENCY_CODES: ReadonlySet<string> = new Set(currencyCodes);

const LEADING_CODE_RE = /^([A-Z]{3})\s+/;
const TRAILING_CODE_RE = /\s+([A-Z]{3})$/;
const SYMBOL_AFFIX_RE = /^[€$£¥₹₽₩]\s*|\s*(?:[€$£¥₹₽₩]|%)$/g;

/** Drop a currency code set off by whitespace, a currency symbol, or a trailing `%`. */
function stripAffixes(s: string): string {
  const lead = LEADING_CODE_RE.exec(s);
  let out = lead && CURRENCY_CODES.has(lead[1]) ? s.slice(lead[0].length) : s;
  const trail = TRAILING_CODE_RE.exec(out);
  if (trail && CURRENCY_CODES.has(trail[1])) out = out.slice(0, out.length - trail[0].length);
  return out.replace(SYMBOL_AFFIX_RE, "");
}

/**
 * Parse a numeric cell. Numbers pass through; strings may carry a currency code or symbol,
 * a trailing `%`, thousands separators and a comma decimal.
 */
export function parseNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (value === undefined || value === null) return undefined;
  let s = stripAffixes(sanitizeString(value)).replace(/\s/g, "");
  if (!s) return undefined;
  if (/^[-+]?\d{1,3}(\.\d{3})+,\d+$/.test(s) || /^[-+]?\d+,\d+$/.test(s)) {
    s = s.replace(/\./g, "").replace(",", ".");
  } else if (/^[-+]?\d{1,3}(\.\d{3}){2,}$/.test(s)) {
    s = s.replace(/\./g, "");
  } else if (/^[-+]?\d{1,3}(,\d{3})+(\.\d+)?$/.test(s)) {
    s = s.replace(/,/g, "");
  }
  if (!/^[-+]?(\d+(\.\d*)?|\.\d+)$/.test(s)) return undefined;
  const n = Number.parseFloat(s);
  return Number.isFinite(n) ? n : undefined;
}

export const looksNumeric = (v: Cell | undefined): boolean => !isBlankCell(v) && parseNumber(v) !== undefined;

/** True for an uppercase ISO 4217 code or a recognized currency symbol. */
export function looksCurrencyCode(v: Cell | undefined): boolean {
  if (v === undefined || v === null || typeof v === "number") return false;
  const s = sanitizeString(v);
  if (CURRENCY_CODES.has(s)) return true;
  return CURRENCY_SYMBOLS[s.toLowerCase()] !== undefined;
}

export function sanitizeIdentifier(v: Cell | undefined, field: string): { value?: string; issues: Issue[] } {
  const issues: Issue[] = [];
  if (typeof v === "number") {
    if (!Number.isFinite(v)) {
      issues.push({ field, code: "E_ID_INVALID", msg: "not a usable identifier", level: "error" });
      return { issues };
    }
    return { value: String(v), issues };
  }
  const s = sanitizeString(v);
  if (!s) {
    issues.push({ field, code: "E_ID_MISSING", msg: `${field} is empty`, level: "error" });
    return { issues };
  }
  return { value: s, issues };
}

export function sanitizeCurrency(v: Cell | undefined): { value?: string; issues: Issue[] } {
  const issues: Issue[] = [];
  const s = typeof v === "number" ? "" : sanitizeString(v);
  if (!s) {
    issues.push({ field: "currency", code: "E_CURRENCY_MISSING", msg: "currency is empty", level: "error" });
    return { issues };
  }
  const mapped = CURRENCY_SYMBOLS[s.toLowerCase()] ?? CURRENCY_WORDS[s.toLowerCase()];
  if (mapped) return { value: mapped, issues };
  if (CURRENCY_CODES.has(s.toUpperCase())) return { value: s.toUpperCase(), issues };
  issues.push({ field: "currency", code: "W_CURRENCY_UNKNOWN", msg: `unrecognized currency "${s}"`, level: "warn" });
  return { value: s.toUpperCase(), issues };
}

export function sanitizePrice(v: Cell | undefined): { value?: number; issues: Issue[] } {
  const issues: Issue[] = [];
  if (isBlankCell(v)) {
    issues.push({ field: "price", code: "E_PRICE_MISSING", msg: "price is empty", level: "error" });
    return { issues };
  }
  const n = parseNumber(v);
  if (n === undefined) {
    issues.push({ field: "price", code: "E_NUM", msg: "not a number", level: "error" });
    return { issues };
  }
  return { value: n, issues };
}
