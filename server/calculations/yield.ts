export const GRAMS_PER_LB = 454;

export interface RunOutputs {
  bioInReactorLbs?: number | null;
  dryHteG?: number | null;
  dryThcaG?: number | null;
}

export interface RunYields {
  gramsRan: number | null;
  overallYieldPct: number | null;
  thcaYieldPct: number | null;
  hteYieldPct: number | null;
}

export function totalDryGrams(run: Pick<RunOutputs, "dryHteG" | "dryThcaG">): number {
  return (run.dryHteG ?? 0) + (run.dryThcaG ?? 0);
}

/**
 * Yield percentages for a run. A run with no (or zero) reactor weight has no
 * yields at all: every percentage is null, never 0 or Infinity.
 */
export function calculateYields(run: RunOutputs): RunYields {
  const gramsRan = run.bioInReactorLbs == null ? null : run.bioInReactorLbs * GRAMS_PER_LB;

  if (gramsRan == null || !(gramsRan > 0)) {
    return { gramsRan, overallYieldPct: null, thcaYieldPct: null, hteYieldPct: null };
  }

  const dryHte = run.dryHteG ?? 0;
  const dryThca = run.dryThcaG ?? 0;

  return {
    gramsRan,
    overallYieldPct: ((dryHte + dryThca) / gramsRan) * 100,
    thcaYieldPct: (dryThca / gramsRan) * 100,
    hteYieldPct: (dryHte / gramsRan) * 100,
  };
}
