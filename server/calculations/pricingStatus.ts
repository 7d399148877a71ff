export const PRICING_STATUSES = ['unlinked', 'unpriced', 'partial', 'priced'] as const;
export type PricingStatus = typeof PRICING_STATUSES[number];

export function classifyPricing(lines: { pricePerLb: number | null }[]): PricingStatus {
  if (lines.length === 0) return "unlinked";
  const priced = lines.filter((line) => line.pricePerLb != null).length;
  if (priced === lines.length) return "priced";
  if (priced === 0) return "unpriced";
  return "partial";
}

// Partial runs stay in: they carry whatever biomass cost is known
export function includeInAnalytics(status: PricingStatus, excludeUnpricedBatches: boolean): boolean {
  if (!excludeUnpricedBatches) return true;
  return status === "priced" || status === "partial";
}
