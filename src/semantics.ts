/**
 * Module: Header Semantics & Alias Scoring
 * Purpose: Provide the alias table per canonical role and the similarity score used to
 * map raw invoice headers to roles. The table is data; callers extend it per run via
 * `EngineOptions.aliases` without touching the scoring logic.
 */
import type { AliasGroup, AssignedRole } from "./types.js";

export type AliasTable = Readonly<Record<AliasGroup, ReadonlyArray<string>>>;

export const ALIAS_TABLE: AliasTable = {
  equipmentId: [
    "evse id",
    "evse",
    "evseid",
    "charge point id",
    "chargepoint id",
    "charge point",
    "charging station id",
    "charging station",
    "station id",
    "station",
    "charger id",
    "charger",
    "cp id",
    "equipment id",
  ],
  sessionId: [
    "session id",
    "session",
    "transaction id",
    "transaction",
    "charging session",
    "charge session id",
    "session number",
    "cdr id",
  ],
  currency: ["currency", "curr", "ccy", "currency code", "wahrung", "devise"],
  price: [
    "price",
    "amount",
    "net",
    "gross",
    "total",
    "cost",
    "fee",
    "value",
    "sum",
    "unit price",
    "price net",
    "net price",
    "amount net",
    "net amount",
    "price gross",
    "gross price",
    "amount gross",
    "gross amount",
    "netto",
    "brutto",
  ],
  vatRate: ["vat rate", "vat", "vat percent", "vat pct", "tax rate", "tax", "tax percent", "mwst", "ust", "iva"],
  net: [
    "net",
    "price net",
    "net price",
    "amount net",
    "net amount",
    "ex vat",
    "excl vat",
    "excluding vat",
    "without vat",
    "before tax",
    "pre tax",
    "netto",
  ],
  gross: [
    "gross",
    "price gross",
    "gross price",
    "amount gross",
    "gross amount",
    "incl vat",
    "including vat",
    "with vat",
    "brutto",
  ],
};

// Cross-role ties resolve in this order; price is the most generic label family
export const ROLE_ORDER: ReadonlyArray<AssignedRole> = ["equipmentId", "sessionId", "currency", "vatRate", "price"];

export const normalizeLabel = (s: string): string =>
  s
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/%/g, " ")
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();

/**
 * Similarity of a raw header against one alias, in 0..1.
 * - exact (normalized) match: 1.0
 * - equal once spaces are removed (`EVSEID` vs `evse id`): 0.95
 * - alias contained in the label, by tokens or as a compact substring: 0.6 + 0.3 × coverage
 * - otherwise token-overlap Dice × 0.6
 */
export function aliasSimilarity(header: string, alias: string): number {
  const h = normalizeLabel(header);
  const a = normalizeLabel(alias);
  if (!h || !a) return 0;
  if (h === a) return 1.0;
  const hc = h.replace(/ /g, "");
  const ac = a.replace(/ /g, "");
  if (hc === ac) return 0.95;
  const hTokens = h.split(" ");
  const aTokens = a.split(" ");
  const hSet = new Set(hTokens);
  if (aTokens.every((t) => hSet.has(t))) {
    return 0.6 + 0.3 * (aTokens.length / hTokens.length);
  }
  if (ac.length >= 4 && hc.includes(ac)) {
    return 0.6 + 0.3 * (ac.length / hc.length);
  }
  const aSet = new Set(aTokens);
  const inter = [...hSet].filter((t) => aSet.has(t)).length;
  const dice = (2 * inter) / (hSet.size + aSet.size);
  return dice * 0.6;
}

/** Best similarity of a header against every alias of one group. */
export function scoreGroup(header: string, group: AliasGroup, table: AliasTable = ALIAS_TABLE): number {
  let best = 0;
  for (const alias of table[group]) {
    const s = aliasSimilarity(header, alias);
    if (s > best) best = s;
  }
  return best;
}

export interface RoleScore {
  role: AssignedRole;
  score: number;
}

/** Scores per role, sorted best first (ties keep `ROLE_ORDER`). */
export function scoreRoles(header: string, table: AliasTable = ALIAS_TABLE): RoleScore[] {
  return ROLE_ORDER.map((role) => ({ role, score: scoreGroup(header, role, table) })).sort((a, b) => b.score - a.score);
}

/** Built-in aliases merged with caller extensions, deduplicated after normalization. */
export function buildAliasTable(extra?: Partial<Record<AliasGroup, string[]>>): AliasTable {
  if (!extra) return ALIAS_TABLE;
  const merge = (g: AliasGroup): string[] => {
    const seen = new Set<string>();
    const merged: string[] = [];
    for (const alias of [...ALIAS_TABLE[g], ...(extra[g] ?? [])]) {
      const n = normalizeLabel(alias);
      if (!n || seen.has(n)) continue;
      seen.add(n);
      merged.push(n);
    }
    return merged;
  };
  return {
    equipmentId: merge("equipmentId"),
    sessionId: merge("sessionId"),
    currency: merge("currency"),
    price: merge("price"),
    vatRate: merge("vatRate"),
    net: merge("net"),
    gross: merge("gross"),
  };
}
