import { describe, expect, it } from "vitest";
import { classifyColumns } from "../src/columnClassifier.js";
import { DEFAULT_OPTIONS } from "../src/config.js";
import type { Grid } from "../src/types.js";

describe("classifyColumns", () => {
  it("maps identity columns from header aliases and collects numeric price candidates", () => {
    const grid: Grid = [
      ["Station", "Transaction", "Curr", "Price Net", "VAT", "Total"],
      ["CP-1", "T-1", "EUR", "10", "21", "see below"],
      ["CP-2", "T-2", "EUR", "20", "21", "-"],
    ];
    const res = classifyColumns(grid, 0, DEFAULT_OPTIONS);
    expect(res.mapping).toEqual({ equipmentId: 0, sessionId: 1, currency: 2 });
    expect(res.priceCandidates.map((c) => c.index)).toEqual([3, 4]);
    expect(res.priceCandidates[0]?.netScore).toBe(1);
    expect(res.priceCandidates[1]?.vatScore).toBe(1);
    expect(res.columns[5]?.role).toBe("unclassified");
    expect(res.sampleRows).toHaveLength(2);
  });

  it("breaks equal header scores on content", () => {
    const grid: Grid = [
      ["EVSE", "Session", "Currency", "Currency", "Amount"],
      ["E1", "S1", "Euro", "EUR", "5"],
      ["E2", "S2", "Euro", "EUR", "6"],
    ];
    const res = classifyColumns(grid, 0, DEFAULT_OPTIONS);
    expect(res.mapping.currency).toBe(3);
    expect(res.columns[2]?.role).toBe("unclassified");
  });

  it("falls back to value shapes when no header matches", () => {
    const grid: Grid = [
      ["Col A", "Col B", "Col C", "Amount"],
      ["DE*ABC*E000001", "3f2b6a1e-8c4d-4e5f-9a7b-1c2d3e4f5a6b", "EUR", "4.20"],
      ["DE*ABC*E000002", "7a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d", "EUR", "3.10"],
    ];
    const res = classifyColumns(grid, 0, DEFAULT_OPTIONS);
    expect(res.mapping).toEqual({ currency: 2, equipmentId: 0, sessionId: 1 });
    expect(res.columns.slice(0, 3).map((c) => [c.role, c.source])).toEqual([
      ["equipmentId", "content"],
      ["sessionId", "content"],
      ["currency", "content"],
    ]);
  });

  it("reads a label shared by session id and price as price when its values are numeric", () => {
    const grid: Grid = [
      ["EVSE ID", "Session ID", "Currency", "Session price"],
      ["E1", "S1", "EUR", "4.50"],
    ];
    const res = classifyColumns(grid, 0, DEFAULT_OPTIONS);
    expect(res.mapping.sessionId).toBe(1);
    expect(res.priceCandidates.map((c) => c.header)).toEqual(["Session price"]);
    expect(res.columns[3]?.role).toBe("price");
  });

  it("leaves unmatched roles out of the mapping", () => {
    const grid: Grid = [
      ["Station ID", "Amount", "Date"],
      ["CP1", "10", "2024-01-01"],
    ];
    const res = classifyColumns(grid, 0, DEFAULT_OPTIONS);
    expect(res.mapping).toEqual({ equipmentId: 0 });
  });
});
