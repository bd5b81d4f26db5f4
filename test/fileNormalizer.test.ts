import { describe, expect, it } from "vitest";
import { normalizeGrid } from "../src/fileNormalizer.js";
import type { Grid, GridSource } from "../src/types.js";

const source = (fileName: string, rows: Grid): GridSource => ({ fileName, format: "csv", rows });

describe("normalizeGrid", () => {
  const invoice: Grid = [
    ["Invoice 2024-03"],
    [],
    ["EVSE ID", "Session ID", "Currency", "Price Gross", "Price Net", "VAT Rate"],
    ["DE*ABC*E1", "S-1", "eur", "11.90", "10,00", "19"],
    ["DE*ABC*E2", "S-2", "EUR", "23.80", "20,00", "19"],
    [null, null, null, null, null, null],
    ["DE*ABC*E3", "", "EUR", "5.95", "5,00", "19"],
  ];

  it("projects data rows below a detected header onto canonical rows", () => {
    const res = normalizeGrid(source("march.csv", invoice));
    expect(res.status).toBe("ok");
    if (res.status !== "ok") return;
    expect(res.rows).toEqual([
      { equipmentId: "DE*ABC*E1", sessionId: "S-1", currency: "EUR", price: 10 },
      { equipmentId: "DE*ABC*E2", sessionId: "S-2", currency: "EUR", price: 20 },
    ]);
    expect(res.dataRows).toBe(3);
    expect(res.skippedRows).toBe(1);
    expect(res.rows.length + res.skippedRows).toBe(res.dataRows);
    expect(res.meta.headerRow).toBe(2);
    expect(res.meta.priceRule).toBe("net_label");
    expect(res.meta.mapping).toEqual({ equipmentId: 0, sessionId: 1, currency: 2, price: 4, vatRate: 5 });
    expect(res.meta.columns.map((c) => c.role)).toEqual([
      "equipmentId",
      "sessionId",
      "currency",
      "unclassified",
      "price",
      "vatRate",
    ]);
    expect(res.meta.skipReasons).toEqual({ E_ID_MISSING: 1 });
    expect(res.meta.sampleSize).toBe(3);
  });

  it("maps all five roles regardless of column order and label spelling", () => {
    const res = normalizeGrid(
      source("shuffled.csv", [
        ["  vat rate ", "currency", "NET PRICE", "session_id", "evse_id"],
        [19, "EUR", "10.00", "S1", "E1"],
      ])
    );
    expect(res.status === "ok" && res.meta.mapping).toEqual({
      equipmentId: 4,
      sessionId: 3,
      currency: 1,
      price: 2,
      vatRate: 0,
    });
  });

  it("takes the net column of whole-number prices beside a VAT column", () => {
    const res = normalizeGrid(
      source("whole.csv", [
        ["EVSE", "Session", "Currency", "Price (EUR)", "Total (EUR)", "VAT %"],
        ["E1", "S1", "EUR", 10, 12.1, 21],
        ["E2", "S2", "EUR", 20, 24.2, 21],
      ])
    );
    expect(res.status === "ok" && res.rows).toEqual([
      { equipmentId: "E1", sessionId: "S1", currency: "EUR", price: 10 },
      { equipmentId: "E2", sessionId: "S2", currency: "EUR", price: 20 },
    ]);
  });

  it("normalizes a file whose price column is labelled session price", () => {
    const res = normalizeGrid(
      source("sessions.csv", [
        ["EVSE ID", "Session ID", "Currency", "Session price"],
        ["E1", "S1", "EUR", "4.50"],
      ])
    );
    expect(res.status === "ok" && res.rows).toEqual([{ equipmentId: "E1", sessionId: "S1", currency: "EUR", price: 4.5 }]);
  });

  it("is deterministic", () => {
    expect(normalizeGrid(source("march.csv", invoice))).toEqual(normalizeGrid(source("march.csv", invoice)));
  });

  it("fails at the header stage when nothing looks like a header", () => {
    expect(normalizeGrid(source("b.csv", [[1, 2, 3], [4, 5, 6]]))).toEqual({
      status: "failed",
      fileName: "b.csv",
      failure: {
        fileName: "b.csv",
        stage: "header",
        code: "E_NO_HEADER",
        reason: "b.csv: No header row found in the first 2 row(s): no row is mostly filled with text labels.",
      },
    });
  });

  it("names every missing mandatory column", () => {
    const res = normalizeGrid(
      source("fees.csv", [
        ["Station ID", "Amount", "Date"],
        ["CP1", "10", "2024-01-01"],
      ])
    );
    expect(res.status).toBe("failed");
    if (res.status !== "failed") return;
    expect(res.failure.stage).toBe("classification");
    expect(res.failure.code).toBe("E_MISSING_FIELD");
    expect(res.failure.reason).toBe("fees.csv: Missing mandatory column(s): session id, currency.");
  });

  it("fails at the price stage when the net price is ambiguous", () => {
    const res = normalizeGrid(
      source("twice.csv", [
        ["EVSE", "Session", "Currency", "Amount", "Amount"],
        ["E1", "S1", "EUR", 10, 12],
      ])
    );
    expect(res.status === "failed" && res.failure.stage).toBe("price");
  });

  it("accepts extra vendor aliases", () => {
    const grid: Grid = [
      ["Ladepunkt", "Vorgang", "Currency", "Net"],
      ["LP-01", "V1", "EUR", "7.5"],
    ];
    const plain = normalizeGrid(source("de.csv", grid));
    expect(plain.status === "failed" && plain.failure.reason).toBe(
      "de.csv: Missing mandatory column(s): EVSE / equipment id, session id."
    );
    const extended = normalizeGrid(source("de.csv", grid), {
      aliases: { equipmentId: ["Ladepunkt"], sessionId: ["Vorgang"] },
    });
    expect(extended.status === "ok" && extended.rows).toEqual([
      { equipmentId: "LP-01", sessionId: "V1", currency: "EUR", price: 7.5 },
    ]);
  });
});
