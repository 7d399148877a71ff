import { describe, expect, it } from "vitest";

import { ConsistencyError, NotFoundError, ValidationError } from "../server/errors";
import { actor, createLedger, runInput, seedPurchase, seedSupplier, type Ledger } from "./support/fixtures";

async function setup() {
  const ledger = await createLedger();
  const supplier = await seedSupplier(ledger, "Farmlane");
  const { purchase, lots } = await seedPurchase(ledger, {
    supplierId: supplier.id,
    pricePerLb: 2,
    lots: [
      { strainName: "Blue Dream", weightLbs: 100 },
      { strainName: "Sour Diesel", weightLbs: 50 },
    ],
  });
  const [lotA, lotB] = lots;
  return { ledger, purchase, lotA, lotB };
}

async function remaining(ledger: Ledger, lotId: string) {
  return (await ledger.storage.getLotById(lotId))?.remainingWeightLbs;
}

// Lot remaining must equal original weight minus every active input against it
async function expectConservation(ledger: Ledger) {
  const inputs = ledger.storage.runInputs;
  for (const lot of await ledger.storage.getLots()) {
    const consumed = inputs.filter((i) => i.lotId === lot.id).reduce((sum, i) => sum + i.weightLbs, 0);
    expect(lot.remainingWeightLbs).toBeCloseTo(lot.weightLbs - consumed, 9);
  }
}

describe("run save and inventory accounting", () => {
  it("consumes lot weight and derives yields and cost on create", async () => {
    const { ledger, lotA, lotB } = await setup();

    const run = await ledger.services.runs.createRun(runInput({
      runDate: "2026-02-10",
      bioInReactorLbs: 50,
      dryThcaG: 1135,
      dryHteG: 1135,
      inputs: [
        { lotId: lotA.id, weightLbs: 30 },
        { lotId: lotB.id, weightLbs: 20 },
      ],
    }), actor);

    expect(await remaining(ledger, lotA.id)).toBe(70);
    expect(await remaining(ledger, lotB.id)).toBe(30);
    expect(run.gramsRan).toBe(22700);
    expect(run.overallYieldPct).toBeCloseTo(10, 10);
    expect(run.biomassCost).toBe(100);
    expect(run.totalCost).toBe(100);
    expect(run.costPerGramCombined).toBeCloseTo(100 / 2270, 12);
    expect(run.createdBy).toBe("user-1");
    await expectConservation(ledger);

    const audit = ledger.storage.auditLogs.filter((e) => e.entityType === "run");
    expect(audit).toHaveLength(1);
    expect(audit[0]).toMatchObject({ action: "create", entityId: run.id, userId: "user-1" });
    expect(audit[0].details).toMatchObject({ pricingStatus: "priced" });
  });

  it("rejects over-consumption and leaves nothing behind", async () => {
    const { ledger, lotA } = await setup();
    await ledger.services.runs.createRun(runInput({ runDate: "2026-02-10", inputs: [{ lotId: lotA.id, weightLbs: 30 }] }), actor);

    const attempt = ledger.services.runs.createRun(runInput({
      runDate: "2026-02-11",
      inputs: [{ lotId: lotA.id, weightLbs: 80 }],
    }), actor);

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    expect(await remaining(ledger, lotA.id)).toBe(70);
    expect(await ledger.storage.getRuns()).toHaveLength(1);
    await expectConservation(ledger);
  });

  it("checks a lot listed twice against its running remainder", async () => {
    const { ledger, lotA } = await setup();

    const attempt = ledger.services.runs.createRun(runInput({
      runDate: "2026-02-10",
      inputs: [
        { lotId: lotA.id, weightLbs: 60 },
        { lotId: lotA.id, weightLbs: 60 },
      ],
    }), actor);

    await expect(attempt).rejects.toThrow("Lot Blue Dream has only 40.0 lbs remaining; 60.0 lbs requested.");
    expect(await remaining(ledger, lotA.id)).toBe(100);
  });

  it("rejects non-positive input weights and unknown lots", async () => {
    const { ledger, lotA } = await setup();

    await expect(ledger.services.runs.createRun(runInput({
      runDate: "2026-02-10",
      inputs: [{ lotId: lotA.id, weightLbs: 0 }],
    }), actor)).rejects.toThrow("Input weight must be greater than zero.");

    await expect(ledger.services.runs.createRun(runInput({
      runDate: "2026-02-10",
      inputs: [{ lotId: "missing-lot", weightLbs: 5 }],
    }), actor)).rejects.toThrow("Lot not found: missing-lot");

    expect(await ledger.storage.getRuns()).toHaveLength(0);
  });

  it("restores old inputs before applying the edited set", async () => {
    const { ledger, lotA, lotB } = await setup();
    const run = await ledger.services.runs.createRun(runInput({
      runDate: "2026-02-10",
      inputs: [
        { lotId: lotA.id, weightLbs: 30 },
        { lotId: lotB.id, weightLbs: 20 },
      ],
    }), actor);

    // Only possible because the 20 lbs already taken from B is returned first
    await ledger.services.runs.updateRun(run.id, runInput({
      runDate: "2026-02-10",
      inputs: [{ lotId: lotB.id, weightLbs: 50 }],
    }), actor);

    expect(await remaining(ledger, lotA.id)).toBe(100);
    expect(await remaining(ledger, lotB.id)).toBe(0);
    expect(ledger.storage.runInputs.map((i) => [i.lotId, i.weightLbs])).toEqual([[lotB.id, 50]]);
    await expectConservation(ledger);
  });

  it("keeps the original inputs when an edit fails", async () => {
    const { ledger, lotA } = await setup();
    const run = await ledger.services.runs.createRun(runInput({
      runDate: "2026-02-10",
      inputs: [{ lotId: lotA.id, weightLbs: 30 }],
    }), actor);

    await expect(ledger.services.runs.updateRun(run.id, runInput({
      runDate: "2026-02-10",
      inputs: [{ lotId: lotA.id, weightLbs: 101 }],
    }), actor)).rejects.toBeInstanceOf(ValidationError);

    expect(await remaining(ledger, lotA.id)).toBe(70);
    expect(ledger.storage.runInputs).toHaveLength(1);
  });

  it("returns consumed weight on delete", async () => {
    const { ledger, lotA, lotB } = await setup();
    const run = await ledger.services.runs.createRun(runInput({
      runDate: "2026-02-10",
      inputs: [
        { lotId: lotA.id, weightLbs: 30 },
        { lotId: lotB.id, weightLbs: 20 },
      ],
    }), actor);

    await ledger.services.runs.deleteRun(run.id, actor);

    expect(await remaining(ledger, lotA.id)).toBe(100);
    expect(await remaining(ledger, lotB.id)).toBe(50);
    expect(await ledger.storage.getRuns()).toHaveLength(0);
    expect(ledger.storage.runInputs).toHaveLength(0);
    expect(ledger.storage.auditLogs.filter((e) => e.entityType === "run").map((e) => e.action)).toEqual(["create", "delete"]);
  });

  it("refuses to delete a run whose lot has disappeared", async () => {
    const { ledger, lotA } = await setup();
    const run = await ledger.services.runs.createRun(runInput({
      runDate: "2026-02-10",
      inputs: [{ lotId: lotA.id, weightLbs: 30 }],
    }), actor);
    ledger.storage.removeLot(lotA.id);

    await expect(ledger.services.runs.deleteRun(run.id, actor)).rejects.toBeInstanceOf(ConsistencyError);
    expect(await ledger.storage.getRunById(run.id)).toBeDefined();
  });

  it("reports unknown runs as not found", async () => {
    const { ledger } = await setup();

    await expect(ledger.services.runs.getRunDetail("nope")).rejects.toBeInstanceOf(NotFoundError);
    await expect(ledger.services.runs.deleteRun("nope", actor)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists runs with their pricing status", async () => {
    const { ledger, lotA } = await setup();
    await ledger.services.runs.createRun(runInput({ runDate: "2026-02-10", inputs: [{ lotId: lotA.id, weightLbs: 10 }] }), actor);
    await ledger.services.runs.createRun(runInput({ runDate: "2026-02-11" }), actor);

    const runs = await ledger.services.runs.getRuns();
    expect(runs.map((r) => [r.runDate, r.pricingStatus])).toEqual([
      ["2026-02-10", "priced"],
      ["2026-02-11", "unlinked"],
    ]);
  });
});
