import { describe, expect, it } from "vitest";

import {
  OperationalRateIndex,
  calculateBiomassCost,
  calculateRunCost,
  type CostAllocationSettings,
} from "../server/calculations/costAllocation";

const uniform: CostAllocationSettings = { costAllocationMethod: "per_gram_uniform", costAllocationThcaPct: 50 };

const january = { startDate: "2026-01-01", endDate: "2026-01-31", totalCost: 1000 };
const runs = [
  { runDate: "2026-01-05", dryThcaG: 300, dryHteG: 200 },
  { runDate: "2026-01-20", dryThcaG: 500, dryHteG: null },
  { runDate: "2026-02-02", dryThcaG: 600, dryHteG: 400 },
];

describe("operational rate index", () => {
  it("spreads an entry over the dry grams of runs inside its window", () => {
    const index = new OperationalRateIndex([january], runs);

    expect(index.getPeriods()[0].periodDryGrams).toBe(1000);
    expect(index.rateFor("2026-01-10")).toBe(1);
    expect(index.rateFor("2026-01-31")).toBe(1);
    expect(index.rateFor("2026-02-02")).toBe(0);
  });

  it("sums overlapping entries", () => {
    const overlap = { startDate: "2026-01-15", endDate: "2026-02-15", totalCost: 600 };
    const index = new OperationalRateIndex([january, overlap], runs);

    expect(index.getPeriods().map((p) => p.periodDryGrams)).toEqual([1000, 1500]);
    expect(index.rateFor("2026-01-05")).toBe(1);
    expect(index.rateFor("2026-01-20")).toBeCloseTo(1.4, 10);
    expect(index.rateFor("2026-02-02")).toBeCloseTo(0.4, 10);
  });

  it("ignores a period with no dry output", () => {
    const march = { startDate: "2026-03-01", endDate: "2026-03-31", totalCost: 500 };
    const index = new OperationalRateIndex([march], runs);

    expect(index.getPeriods()[0].periodDryGrams).toBe(0);
    expect(index.rateFor("2026-03-10")).toBe(0);
  });
});

describe("run cost", () => {
  const lines = [{ weightLbs: 100, pricePerLb: 3 }];
  const outputs = { dryThcaG: 400, dryHteG: 200 };

  it("skips unpriced lines in biomass cost", () => {
    expect(calculateBiomassCost([{ weightLbs: 50, pricePerLb: 2 }, { weightLbs: 30, pricePerLb: null }])).toBe(100);
  });

  it("adds operational cost on dry grams and reconciles the combined rate", () => {
    const cost = calculateRunCost({ outputs, lines, opRate: 0.5, settings: uniform });

    expect(cost.biomassCost).toBe(300);
    expect(cost.totalCost).toBe(600);
    expect(cost.costPerGramCombined).toBe(1);
    expect(cost.costPerGramThca).toBe(1);
    expect(cost.costPerGramHte).toBe(1);
    expect((cost.costPerGramCombined ?? 0) * cost.totalDryGrams).toBe(cost.totalCost);
  });

  it("splits cost evenly between products", () => {
    const cost = calculateRunCost({
      outputs,
      lines,
      opRate: 0.5,
      settings: { costAllocationMethod: "split_50_50", costAllocationThcaPct: 50 },
    });

    expect(cost.costPerGramThca).toBe(0.75);
    expect(cost.costPerGramHte).toBe(1.5);
  });

  it("splits by a custom THCA share and clamps it to 0-100", () => {
    const custom = calculateRunCost({
      outputs,
      lines,
      opRate: 0.5,
      settings: { costAllocationMethod: "custom_split", costAllocationThcaPct: 25 },
    });
    expect(custom.costPerGramThca).toBe(0.375);
    expect(custom.costPerGramHte).toBe(2.25);

    const clamped = calculateRunCost({
      outputs,
      lines,
      opRate: 0.5,
      settings: { costAllocationMethod: "custom_split", costAllocationThcaPct: 150 },
    });
    expect(clamped.costPerGramThca).toBe(1.5);
    expect(clamped.costPerGramHte).toBe(0);
  });

  it("leaves a product without output unpriced under a split", () => {
    const cost = calculateRunCost({
      outputs: { dryThcaG: 400, dryHteG: null },
      lines,
      opRate: 0,
      settings: { costAllocationMethod: "split_50_50", costAllocationThcaPct: 50 },
    });

    expect(cost.costPerGramThca).toBe(0.375);
    expect(cost.costPerGramHte).toBeNull();
  });

  it("has no per-gram cost without dry output", () => {
    const cost = calculateRunCost({ outputs: { dryThcaG: null, dryHteG: 0 }, lines, opRate: 2, settings: uniform });

    expect(cost.totalCost).toBe(300);
    expect(cost.costPerGramCombined).toBeNull();
    expect(cost.costPerGramThca).toBeNull();
    expect(cost.costPerGramHte).toBeNull();
  });

  it("has no per-gram cost when nothing was priced", () => {
    const cost = calculateRunCost({
      outputs,
      lines: [{ weightLbs: 100, pricePerLb: null }],
      opRate: 0,
      settings: uniform,
    });

    expect(cost.totalCost).toBe(0);
    expect(cost.costPerGramCombined).toBeNull();
  });
});
