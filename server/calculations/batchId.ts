import { format, parseISO } from "date-fns";
import { GenerationExhaustedError } from "../errors";

export const BATCH_ID_MAX_LENGTH = 80;
export const BATCH_ID_MAX_ATTEMPTS = 50;
const PREFIX_LENGTH = 5;

export function supplierPrefix(name: string | null | undefined): string {
  const cleaned = (name ?? "").toUpperCase().replace(/[^A-Z0-9]/g, "");
  if (!cleaned) return "BATCH";
  return cleaned.slice(0, PREFIX_LENGTH).padStart(PREFIX_LENGTH, "X");
}

// Delivery date wins over purchase date; both are YYYY-MM-DD
export function effectiveBatchDate(deliveryDate: string | null | undefined, purchaseDate: string | null | undefined): string | null {
  return deliveryDate || purchaseDate || null;
}

/**
 * Readable batch identifier, e.g. FARML-15FEB26-200.
 * Missing dates fall back to `today`.
 */
export function generateBatchId(
  supplierName: string | null | undefined,
  effectiveDate: string | null | undefined,
  weightLbs: number | null | undefined,
  today: Date = new Date(),
): string {
  const d = effectiveDate ? parseISO(effectiveDate) : today;
  const datePart = format(d, "ddMMMyy").toUpperCase();
  const weight = Math.round(weightLbs ?? 0);
  return `${supplierPrefix(supplierName)}-${datePart}-${weight}`.slice(0, BATCH_ID_MAX_LENGTH);
}

export function normalizeBatchId(candidate: string): string {
  return candidate.trim().toUpperCase();
}

// Candidate n (n >= 2) with the base shortened so the suffix always fits
export function suffixedBatchId(base: string, n: number): string {
  const suffix = `-${n}`;
  return `${base.slice(0, BATCH_ID_MAX_LENGTH - suffix.length)}${suffix}`;
}

/**
 * Returns the first free candidate among base, base-2, base-3, ...
 * Throws GenerationExhaustedError after BATCH_ID_MAX_ATTEMPTS candidates.
 */
export async function ensureUniqueBatchId(
  candidate: string,
  isTaken: (batchId: string) => Promise<boolean>,
  maxAttempts: number = BATCH_ID_MAX_ATTEMPTS,
): Promise<string> {
  const base = (normalizeBatchId(candidate) || "BATCH").slice(0, BATCH_ID_MAX_LENGTH);

  let batchId = base;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (!(await isTaken(batchId))) {
      return batchId;
    }
    batchId = suffixedBatchId(base, attempt + 1);
  }
  throw new GenerationExhaustedError(base, maxAttempts);
}
