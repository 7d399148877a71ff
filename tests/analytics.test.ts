import { describe, expect, it } from "vitest";

import {
  applyPricingFilter,
  applyWindow,
  evaluateKpi,
  groupByStrainAndSupplier,
  groupBySupplier,
  mean,
  summarizeRuns,
  type RunFact,
  type RunMetrics,
  type RunSource,
} from "../server/calculations/analytics";
import { classifyPricing, type PricingStatus } from "../server/calculations/pricingStatus";

const today = new Date(2026, 1, 20);

function metrics(id: string, runDate: string, overrides: Partial<RunMetrics> = {}): RunMetrics {
  return {
    id,
    runDate,
    isRollover: false,
    bioInReactorLbs: 100,
    dryHteG: 100,
    dryThcaG: 200,
    overallYieldPct: 10,
    thcaYieldPct: 6,
    hteYieldPct: 4,
    costPerGramCombined: 2,
    costPerGramThca: 2,
    costPerGramHte: 2,
    createdAt: new Date(2026, 0, 1),
    ...overrides,
  };
}

function source(supplierId: string, strainName: string): RunSource {
  return { purchaseId: `p-${supplierId}`, supplierId, supplierName: supplierId.toUpperCase(), strainName };
}

function fact(run: RunMetrics, pricingStatus: PricingStatus, sources: RunSource[] = []): RunFact {
  return { run, pricingStatus, sources };
}

describe("pricing status", () => {
  it("classifies runs by how many input lines carry a price", () => {
    expect(classifyPricing([])).toBe("unlinked");
    expect(classifyPricing([{ pricePerLb: 2 }, { pricePerLb: 3 }])).toBe("priced");
    expect(classifyPricing([{ pricePerLb: null }])).toBe("unpriced");
    expect(classifyPricing([{ pricePerLb: 2 }, { pricePerLb: null }])).toBe("partial");
  });

  it("drops unlinked and unpriced runs only when exclusion is on", () => {
    const facts = (["unlinked", "unpriced", "partial", "priced"] as const).map((status, i) =>
      fact(metrics(`r${i}`, "2026-02-01"), status));

    expect(applyPricingFilter(facts, true).map((f) => f.pricingStatus)).toEqual(["partial", "priced"]);
    expect(applyPricingFilter(facts, false)).toHaveLength(4);
  });
});

describe("analytics windows", () => {
  it("keeps runs on or after the window start", () => {
    const facts = [
      fact(metrics("old", "2026-01-20"), "priced"),
      fact(metrics("edge", "2026-01-21"), "priced"),
      fact(metrics("new", "2026-02-19"), "priced"),
    ];

    expect(applyWindow(facts, { kind: "days", days: 30 }, today).map((f) => f.run.id)).toEqual(["edge", "new"]);
  });

  it("picks the most recent run, later creation breaking date ties", () => {
    const facts = [
      fact(metrics("first", "2026-02-10", { createdAt: new Date(2026, 1, 10, 8) }), "priced"),
      fact(metrics("second", "2026-02-10", { createdAt: new Date(2026, 1, 10, 14) }), "priced"),
      fact(metrics("earlier", "2026-02-01"), "priced"),
    ];

    expect(applyWindow(facts, { kind: "last_batch" }).map((f) => f.run.id)).toEqual(["second"]);
    expect(applyWindow([], { kind: "last_batch" })).toEqual([]);
  });
});

describe("grouping and summaries", () => {
  it("counts a run once per supplier even with several lots from it", () => {
    const run = fact(metrics("r1", "2026-02-01"), "priced", [source("farm", "Blue Dream"), source("farm", "Sour Diesel"), source("oak", "Blue Dream")]);
    const groups = groupBySupplier([run]);

    expect(groups.get("farm")).toHaveLength(1);
    expect(groups.get("oak")).toHaveLength(1);
  });

  it("groups by strain and supplier pairs", () => {
    const a = fact(metrics("a", "2026-02-01"), "priced", [source("farm", "Blue Dream")]);
    const b = fact(metrics("b", "2026-02-02"), "priced", [source("farm", "Blue Dream"), source("oak", "Blue Dream")]);
    const groups = groupByStrainAndSupplier([a, b]);

    expect(groups.map((g) => [g.strainName, g.supplierId, g.facts.length])).toEqual([
      ["Blue Dream", "farm", 2],
      ["Blue Dream", "oak", 1],
    ]);
  });

  it("averages known values and totals weights", () => {
    const summary = summarizeRuns([
      metrics("a", "2026-02-01", { overallYieldPct: 8, costPerGramCombined: null }),
      metrics("b", "2026-02-02", { overallYieldPct: 12, costPerGramCombined: 3, bioInReactorLbs: 50 }),
    ]);

    expect(summary.runCount).toBe(2);
    expect(summary.avgOverallYieldPct).toBe(10);
    expect(summary.avgCostPerGram).toBe(3);
    expect(summary.totalLbs).toBe(150);
    expect(summary.totalDryThcaG).toBe(400);
  });

  it("returns null for a mean over nothing known", () => {
    expect(mean([])).toBeNull();
    expect(mean([null, undefined])).toBeNull();
    expect(mean([1, null, 3])).toBe(2);
  });
});

describe("kpi evaluation", () => {
  const higher = { direction: "higher_is_better" as const, greenThreshold: 7, yellowThreshold: 6 };
  const lower = { direction: "lower_is_better" as const, greenThreshold: 4, yellowThreshold: 6 };

  it("colors higher-is-better targets", () => {
    expect(evaluateKpi(higher, 7.5)).toBe("green");
    expect(evaluateKpi(higher, 6.5)).toBe("yellow");
    expect(evaluateKpi(higher, 5)).toBe("red");
    expect(evaluateKpi(higher, null)).toBe("gray");
  });

  it("colors lower-is-better targets", () => {
    expect(evaluateKpi(lower, 3)).toBe("green");
    expect(evaluateKpi(lower, 5)).toBe("yellow");
    expect(evaluateKpi(lower, 7)).toBe("red");
  });
});
