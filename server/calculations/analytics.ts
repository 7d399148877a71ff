import { format, subDays } from "date-fns";
import type { KpiTarget, Run } from "@shared/schema";
import { includeInAnalytics, type PricingStatus } from "./pricingStatus";

export type RunMetrics = Pick<Run,
  | "id"
  | "runDate"
  | "isRollover"
  | "bioInReactorLbs"
  | "dryHteG"
  | "dryThcaG"
  | "overallYieldPct"
  | "thcaYieldPct"
  | "hteYieldPct"
  | "costPerGramCombined"
  | "costPerGramThca"
  | "costPerGramHte"
  | "createdAt">;

// Where a run's biomass came from, one entry per input line
export interface RunSource {
  purchaseId: string;
  supplierId: string;
  supplierName: string;
  strainName: string;
}

export interface RunFact {
  run: RunMetrics;
  pricingStatus: PricingStatus;
  sources: RunSource[];
}

export interface PerformanceSummary {
  runCount: number;
  avgOverallYieldPct: number | null;
  avgThcaYieldPct: number | null;
  avgHteYieldPct: number | null;
  avgCostPerGram: number | null;
  avgCostPerGramThca: number | null;
  avgCostPerGramHte: number | null;
  totalLbs: number;
  totalDryThcaG: number;
  totalDryHteG: number;
}

export type AnalyticsWindow =
  | { kind: "all" }
  | { kind: "days"; days: number }
  | { kind: "last_batch" };

export type KpiColor = "green" | "yellow" | "red" | "gray";

export function toIsoDate(d: Date): string {
  return format(d, "yyyy-MM-dd");
}

export function windowStartDate(days: number, today: Date = new Date()): string {
  return toIsoDate(subDays(today, days));
}

// Arithmetic mean over known values; null when nothing is known
export function mean(values: (number | null | undefined)[]): number | null {
  const known = values.filter((v): v is number => v != null && Number.isFinite(v));
  if (known.length === 0) return null;
  return known.reduce((sum, v) => sum + v, 0) / known.length;
}

export function summarizeRuns(runs: RunMetrics[]): PerformanceSummary {
  return {
    runCount: runs.length,
    avgOverallYieldPct: mean(runs.map((r) => r.overallYieldPct)),
    avgThcaYieldPct: mean(runs.map((r) => r.thcaYieldPct)),
    avgHteYieldPct: mean(runs.map((r) => r.hteYieldPct)),
    avgCostPerGram: mean(runs.map((r) => r.costPerGramCombined)),
    avgCostPerGramThca: mean(runs.map((r) => r.costPerGramThca)),
    avgCostPerGramHte: mean(runs.map((r) => r.costPerGramHte)),
    totalLbs: runs.reduce((sum, r) => sum + (r.bioInReactorLbs ?? 0), 0),
    totalDryThcaG: runs.reduce((sum, r) => sum + (r.dryThcaG ?? 0), 0),
    totalDryHteG: runs.reduce((sum, r) => sum + (r.dryHteG ?? 0), 0),
  };
}

export function applyPricingFilter(facts: RunFact[], excludeUnpricedBatches: boolean): RunFact[] {
  return facts.filter((fact) => includeInAnalytics(fact.pricingStatus, excludeUnpricedBatches));
}

function byRecency(a: RunFact, b: RunFact): number {
  if (a.run.runDate !== b.run.runDate) return a.run.runDate < b.run.runDate ? 1 : -1;
  return b.run.createdAt.getTime() - a.run.createdAt.getTime();
}

export function applyWindow(facts: RunFact[], window: AnalyticsWindow, today: Date = new Date()): RunFact[] {
  switch (window.kind) {
    case "all":
      return facts;
    case "days": {
      const start = windowStartDate(window.days, today);
      return facts.filter((fact) => fact.run.runDate >= start);
    }
    case "last_batch":
      return [...facts].sort(byRecency).slice(0, 1);
  }
}

/**
 * Groups runs by the supplier(s) they drew biomass from. A run with several
 * input lots from one supplier still counts once for that supplier.
 */
export function groupBySupplier(facts: RunFact[]): Map<string, RunFact[]> {
  const groups = new Map<string, RunFact[]>();
  for (const fact of facts) {
    const supplierIds = new Set(fact.sources.map((s) => s.supplierId));
    supplierIds.forEach((supplierId) => {
      const group = groups.get(supplierId) ?? [];
      group.push(fact);
      groups.set(supplierId, group);
    });
  }
  return groups;
}

export interface StrainGroup {
  strainName: string;
  supplierId: string;
  supplierName: string;
  facts: RunFact[];
}

export function groupByStrainAndSupplier(facts: RunFact[]): StrainGroup[] {
  const groups = new Map<string, StrainGroup>();
  for (const fact of facts) {
    const seen = new Set<string>();
    for (const source of fact.sources) {
      const key = JSON.stringify([source.strainName, source.supplierId]);
      if (seen.has(key)) continue;
      seen.add(key);
      const group = groups.get(key) ?? {
        strainName: source.strainName,
        supplierId: source.supplierId,
        supplierName: source.supplierName,
        facts: [],
      };
      group.facts.push(fact);
      groups.set(key, group);
    }
  }
  return Array.from(groups.values());
}

export function evaluateKpi(target: Pick<KpiTarget, "direction" | "greenThreshold" | "yellowThreshold">, actual: number | null): KpiColor {
  if (actual == null) return "gray";
  if (target.direction === "higher_is_better") {
    if (actual >= target.greenThreshold) return "green";
    if (actual >= target.yellowThreshold) return "yellow";
    return "red";
  }
  if (actual <= target.greenThreshold) return "green";
  if (actual <= target.yellowThreshold) return "yellow";
  return "red";
}
