import {
  insertPurchaseSchema,
  insertRunSchema,
  insertSupplierSchema,
  type PurchaseStatus,
} from "@shared/schema";
import type { Actor } from "../../server/Service/Abstractions/IAuditService";
import { createServices, type LedgerServices } from "../../server/services";
import { MemLedgerStorage } from "./MemLedgerStorage";

export const TODAY = new Date(2026, 1, 20);
export const actor: Actor = { userId: "user-1" };

export interface Ledger {
  storage: MemLedgerStorage;
  services: LedgerServices;
}

export async function createLedger(): Promise<Ledger> {
  const storage = new MemLedgerStorage();
  const services = createServices(storage, { now: () => TODAY });
  await services.settings.seedDefaults();
  return { storage, services };
}

export async function seedSupplier(ledger: Ledger, name: string) {
  return ledger.services.suppliers.createSupplier(insertSupplierSchema.parse({ name }), actor);
}

export async function seedPurchase(
  ledger: Ledger,
  options: {
    supplierId: string;
    lots: { strainName: string; weightLbs: number }[];
    pricePerLb?: number | null;
    statedPotencyPct?: number | null;
    status?: PurchaseStatus;
    purchaseDate?: string;
  },
) {
  const totalLbs = options.lots.reduce((sum, lot) => sum + lot.weightLbs, 0);
  const purchase = await ledger.services.purchases.createPurchase(insertPurchaseSchema.parse({
    supplierId: options.supplierId,
    purchaseDate: options.purchaseDate ?? "2026-02-01",
    status: options.status ?? "delivered",
    statedWeightLbs: totalLbs,
    pricePerLb: options.pricePerLb ?? null,
    statedPotencyPct: options.statedPotencyPct ?? null,
    lots: options.lots,
  }), actor);
  const lots = await ledger.storage.getLots({ purchaseId: purchase.id });
  return { purchase, lots };
}

export function runInput(fields: Record<string, unknown>) {
  return insertRunSchema.parse({ reactorNumber: 1, ...fields });
}
