import type { CostAllocationMethod } from "@shared/schema";
import { totalDryGrams } from "./yield";

export interface BiomassCostLine {
  weightLbs: number;
  pricePerLb: number | null;
}

export interface CostWindow {
  startDate: string;
  endDate: string;
  totalCost: number;
}

export interface DatedRunOutput {
  runDate: string;
  dryHteG: number | null;
  dryThcaG: number | null;
}

export interface CostAllocationSettings {
  costAllocationMethod: CostAllocationMethod;
  costAllocationThcaPct: number;
}

export interface RunCostBreakdown {
  biomassCost: number;
  opRate: number;
  totalDryGrams: number;
  totalCost: number;
  costPerGramCombined: number | null;
  costPerGramThca: number | null;
  costPerGramHte: number | null;
}

// Unpriced lines contribute nothing; pricing status is classified separately
export function calculateBiomassCost(lines: BiomassCostLine[]): number {
  return lines.reduce((sum, line) => sum + (line.pricePerLb != null ? line.weightLbs * line.pricePerLb : 0), 0);
}

function lowerBound(sorted: string[], value: string): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function upperBound(sorted: string[], value: string): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

export interface CostPeriod<T extends CostWindow = CostWindow> {
  entry: T;
  periodDryGrams: number;
}

/**
 * Per-gram operational rate by run date.
 *
 * Each cost entry is spread over the dry grams produced by every run dated
 * inside its inclusive [startDate, endDate] window. Period totals are computed
 * once here (sorted dates + prefix sums) so looking up a run's rate does not
 * rescan the run table. Overlapping entries are summed.
 */
export class OperationalRateIndex<T extends CostWindow = CostWindow> {
  private readonly periods: CostPeriod<T>[];

  constructor(entries: T[], runs: DatedRunOutput[]) {
    const sorted = runs
      .map((run) => ({ date: run.runDate, grams: totalDryGrams(run) }))
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    const dates = sorted.map((r) => r.date);
    const prefix = [0];
    for (const r of sorted) {
      prefix.push(prefix[prefix.length - 1] + r.grams);
    }

    this.periods = entries.map((entry) => {
      const from = lowerBound(dates, entry.startDate);
      const to = upperBound(dates, entry.endDate);
      const periodDryGrams = to > from ? prefix[to] - prefix[from] : 0;
      return { entry, periodDryGrams };
    });
  }

  // In the order the entries were given
  getPeriods(): readonly CostPeriod<T>[] {
    return this.periods;
  }

  rateFor(runDate: string): number {
    let rate = 0;
    for (const { entry, periodDryGrams } of this.periods) {
      if (entry.startDate <= runDate && runDate <= entry.endDate && periodDryGrams > 0) {
        rate += entry.totalCost / periodDryGrams;
      }
    }
    return rate;
  }
}

function perGram(cost: number, grams: number | null): number | null {
  return grams != null && grams > 0 ? cost / grams : null;
}

export function splitProductCost(
  totalCost: number,
  costPerGramCombined: number | null,
  dryThcaG: number | null,
  dryHteG: number | null,
  settings: CostAllocationSettings,
): { costPerGramThca: number | null; costPerGramHte: number | null } {
  if (costPerGramCombined == null) {
    return { costPerGramThca: null, costPerGramHte: null };
  }

  switch (settings.costAllocationMethod) {
    case "split_50_50":
      return {
        costPerGramThca: perGram(totalCost / 2, dryThcaG),
        costPerGramHte: perGram(totalCost / 2, dryHteG),
      };
    case "custom_split": {
      const thcaShare = Math.min(100, Math.max(0, settings.costAllocationThcaPct)) / 100;
      return {
        costPerGramThca: perGram(totalCost * thcaShare, dryThcaG),
        costPerGramHte: perGram(totalCost * (1 - thcaShare), dryHteG),
      };
    }
    case "per_gram_uniform":
      return { costPerGramThca: costPerGramCombined, costPerGramHte: costPerGramCombined };
  }
}

/**
 * Full cost picture for one run: biomass dollars from its input lots plus the
 * operational rate applied to its dry output, then split by product.
 * $/g figures are null when the run has no dry output or no cost at all.
 */
export function calculateRunCost(params: {
  outputs: { dryHteG: number | null; dryThcaG: number | null };
  lines: BiomassCostLine[];
  opRate: number;
  settings: CostAllocationSettings;
}): RunCostBreakdown {
  const { outputs, lines, opRate, settings } = params;
  const biomassCost = calculateBiomassCost(lines);
  const dryGrams = totalDryGrams(outputs);
  const totalCost = biomassCost + opRate * dryGrams;
  // Zero cost reads as "not priced yet", not as free product: null, never 0
  const costPerGramCombined = dryGrams > 0 && totalCost > 0 ? totalCost / dryGrams : null;

  return {
    biomassCost,
    opRate,
    totalDryGrams: dryGrams,
    totalCost,
    costPerGramCombined,
    ...splitProductCost(totalCost, costPerGramCombined, outputs.dryThcaG, outputs.dryHteG, settings),
  };
}
