import { describe, expect, it } from "vitest";

import { importRowSchema } from "@shared/schema";
import { buildImportKey, parseImportDate } from "../server/Service/Implementations/ImportService";
import { actor, createLedger } from "./support/fixtures";

const row = (fields: Record<string, unknown>) => importRowSchema.parse(fields);

describe("import date parsing", () => {
  const reference = new Date(2026, 5, 1);

  it("accepts ISO and US spellings", () => {
    expect(parseImportDate("2026-2-3", reference)).toBe("2026-02-03");
    expect(parseImportDate("02/03/2026", reference)).toBe("2026-02-03");
    expect(parseImportDate("2/3/26", reference)).toBe("2026-02-03");
  });

  it("fills in the year for month/day spellings", () => {
    expect(parseImportDate("2/3", reference)).toBe("2026-02-03");
    expect(parseImportDate("2-3", reference)).toBe("2026-02-03");
    expect(parseImportDate("2-3-2025", reference)).toBe("2025-02-03");
    expect(parseImportDate("2_3_2025", reference)).toBe("2025-02-03");
    expect(parseImportDate("12_31", reference)).toBe("2026-12-31");
  });

  it("returns null for anything else", () => {
    expect(parseImportDate("2/30", reference)).toBeNull();
    expect(parseImportDate("13/45/2026", reference)).toBeNull();
    expect(parseImportDate("next tuesday", reference)).toBeNull();
    expect(parseImportDate(null, reference)).toBeNull();
  });
});

describe("run import", () => {
  it("imports rows, skipping incomplete and duplicate ones", async () => {
    const ledger = await createLedger();

    const report = await ledger.services.imports.importRows([
      row({ runDate: "2026-02-03", source: "Farmlane", strain: "Blue Dream", lbsRan: 100, dryThcaG: 4540, dryHteG: 0, pricePerLb: 2 }),
      row({ runDate: "2026-02-03", source: "FARMLANE", strain: "blue dream", lbsRan: 100 }),
      row({ runDate: "", source: "Farmlane", strain: "Blue Dream", lbsRan: 10 }),
      row({ runDate: "2026-02-04", source: "farmlane", strain: "Blue Dream", lbsRan: 50 }),
    ], actor);

    expect(report).toEqual({ imported: 2, skipped: 2, errors: 0 });

    const suppliers = await ledger.storage.getSuppliers();
    expect(suppliers.map((s) => s.name)).toEqual(["Farmlane"]);

    const purchases = await ledger.storage.getPurchases();
    expect(purchases).toHaveLength(1);
    expect(purchases[0]).toMatchObject({ status: "complete", pricePerLb: 2, batchId: "FARML-03FEB26-0" });

    const lots = await ledger.storage.getLots();
    expect(lots.map((l) => [l.strainName, l.weightLbs, l.remainingWeightLbs])).toEqual([["Blue Dream", 150, 0]]);

    const runs = await ledger.storage.getRuns();
    expect(runs.map((r) => r.runDate)).toEqual(["2026-02-03", "2026-02-04"]);
    expect(runs[0].thcaYieldPct).toBeCloseTo(10, 10);
    expect(runs[0].biomassCost).toBe(200);
    expect(runs[1].biomassCost).toBe(100);
  });

  it("imports a row without a source as an unlinked run", async () => {
    const ledger = await createLedger();

    const report = await ledger.services.imports.importRows([
      row({ runDate: "2026-02-03", strain: "Blue Dream", gramsRan: 4540, dryThcaG: 454 }),
    ], actor);

    expect(report).toEqual({ imported: 1, skipped: 0, errors: 0 });
    const [run] = await ledger.storage.getRuns();
    expect(run.bioInReactorLbs).toBe(10);
    expect(run.thcaYieldPct).toBeCloseTo(10, 10);
    expect(ledger.storage.runInputs).toHaveLength(0);
    expect(await ledger.storage.getSuppliers()).toHaveLength(0);
    expect(run.importKey).toBe("2026-02-03|blue dream|");
  });

  it("skips a re-imported row that created a run without inputs", async () => {
    const ledger = await createLedger();
    const unlinked = row({ runDate: "2026-02-03", strain: "Blue Dream", gramsRan: 4540, dryThcaG: 454 });
    const withoutWeight = row({ runDate: "2026-02-03", source: "Farmlane", strain: "Blue Dream", dryThcaG: 454 });

    expect(await ledger.services.imports.importRows([unlinked, withoutWeight], actor))
      .toEqual({ imported: 2, skipped: 0, errors: 0 });
    expect(await ledger.services.imports.importRows([unlinked, withoutWeight], actor))
      .toEqual({ imported: 0, skipped: 2, errors: 0 });

    const runs = await ledger.storage.getRuns();
    expect(runs.map((r) => r.importKey)).toEqual([
      "2026-02-03|blue dream|",
      "2026-02-03|blue dream|farmlane",
    ]);
    expect(ledger.storage.runInputs).toHaveLength(0);
  });

  it("builds the same key regardless of case and padding", () => {
    expect(buildImportKey("2026-02-03", " Blue Dream ", "FARMLANE")).toBe(buildImportKey("2026-02-03", "blue dream", "Farmlane"));
  });
});
