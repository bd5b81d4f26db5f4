import { describe, expect, it } from "vitest";
import { aliasSimilarity, buildAliasTable, normalizeLabel, scoreGroup, scoreRoles } from "../src/semantics.js";

describe("normalizeLabel", () => {
  it("ignores case, punctuation, underscores and camelCase", () => {
    expect(normalizeLabel("EVSE_ID")).toBe("evse id");
    expect(normalizeLabel("EvseId")).toBe("evse id");
    expect(normalizeLabel("VAT%")).toBe("vat");
    expect(normalizeLabel("  Net   Price ")).toBe("net price");
    expect(normalizeLabel("Währung")).toBe("wahrung");
  });
});

describe("aliasSimilarity", () => {
  it("scores exact, compact, contained and unrelated labels", () => {
    expect(aliasSimilarity("Evse Id", "evse id")).toBe(1);
    expect(aliasSimilarity("EVSEID", "evse id")).toBe(0.95);
    expect(aliasSimilarity("Charging Session ID", "session id")).toBeCloseTo(0.8, 10);
    expect(aliasSimilarity("Colour", "currency")).toBe(0);
  });
});

describe("scoreRoles", () => {
  it("ranks the matching role first", () => {
    expect(scoreRoles("VAT Rate")[0]).toEqual({ role: "vatRate", score: 1 });
    expect(scoreRoles("Transaction ID")[0]).toEqual({ role: "sessionId", score: 1 });
    expect(scoreRoles("Net")[0]).toEqual({ role: "price", score: 1 });
  });
});

describe("buildAliasTable", () => {
  it("extends the built-in aliases", () => {
    const table = buildAliasTable({ equipmentId: ["Ladepunkt"] });
    expect(scoreGroup("Ladepunkt", "equipmentId", table)).toBe(1);
    expect(scoreGroup("Ladepunkt", "equipmentId")).toBeLessThan(0.6);
    expect(scoreGroup("EVSE ID", "equipmentId", table)).toBe(1);
  });
});
