// Price implied by stated potency when none was agreed
export function autoPricePerLb(statedPotencyPct: number | null | undefined, potencyRate: number): number | null {
  if (statedPotencyPct == null || !(statedPotencyPct > 0)) return null;
  return potencyRate * statedPotencyPct;
}

// Actual weight wins over stated weight once the purchase is weighed in
export function purchaseTotalCost(
  statedWeightLbs: number | null | undefined,
  actualWeightLbs: number | null | undefined,
  pricePerLb: number | null | undefined,
): number | null {
  const weight = actualWeightLbs ?? statedWeightLbs;
  if (weight == null || pricePerLb == null) return null;
  return weight * pricePerLb;
}

/**
 * Settlement owed to (positive) or by (negative) the supplier once tested
 * potency is known. Needs stated potency, tested potency and an actual weight.
 */
export function trueUpAmount(
  statedPotencyPct: number | null | undefined,
  testedPotencyPct: number | null | undefined,
  actualWeightLbs: number | null | undefined,
  potencyRate: number,
): number | null {
  if (statedPotencyPct == null || testedPotencyPct == null || actualWeightLbs == null) return null;
  return (testedPotencyPct - statedPotencyPct) * potencyRate * actualWeightLbs;
}
