import { describe, expect, it } from "vitest";

import { insertLotSchema, insertPurchaseSchema } from "@shared/schema";
import { NotFoundError } from "../server/errors";
import { autoPricePerLb, purchaseTotalCost, trueUpAmount } from "../server/calculations/purchaseCosting";
import { actor, createLedger, seedPurchase, seedSupplier } from "./support/fixtures";

describe("purchase costing", () => {
  it("derives price from stated potency only when positive", () => {
    expect(autoPricePerLb(20, 1.5)).toBe(30);
    expect(autoPricePerLb(0, 1.5)).toBeNull();
    expect(autoPricePerLb(null, 1.5)).toBeNull();
  });

  it("prices actual weight over stated weight", () => {
    expect(purchaseTotalCost(100, null, 3)).toBe(300);
    expect(purchaseTotalCost(100, 90, 3)).toBe(270);
    expect(purchaseTotalCost(100, 90, null)).toBeNull();
  });

  it("needs stated, tested and actual figures for a true-up", () => {
    expect(trueUpAmount(20, 22, 90, 1.5)).toBe(270);
    expect(trueUpAmount(20, 18, 90, 1.5)).toBe(-270);
    expect(trueUpAmount(20, null, 90, 1.5)).toBeNull();
  });
});

describe("purchase service", () => {
  it("fills price, total cost and true-up from settings", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");

    const purchase = await ledger.services.purchases.createPurchase(insertPurchaseSchema.parse({
      supplierId: supplier.id,
      purchaseDate: "2026-02-01",
      statedWeightLbs: 100,
      actualWeightLbs: 90,
      statedPotencyPct: 20,
      testedPotencyPct: 22,
    }), actor);

    expect(purchase.pricePerLb).toBe(30);
    expect(purchase.totalCost).toBe(2700);
    expect(purchase.trueUpAmount).toBe(270);
    expect(purchase.trueUpStatus).toBe("pending");
  });

  it("creates lots with their full weight remaining", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");
    const { purchase, lots } = await seedPurchase(ledger, {
      supplierId: supplier.id,
      lots: [{ strainName: "Blue Dream", weightLbs: 60 }],
    });

    const added = await ledger.services.purchases.addLot(
      purchase.id,
      insertLotSchema.parse({ strainName: "Sour Diesel", weightLbs: 40 }),
      actor,
    );

    expect(lots.map((l) => [l.strainName, l.weightLbs, l.remainingWeightLbs])).toEqual([["Blue Dream", 60, 60]]);
    expect(added.remainingWeightLbs).toBe(40);

    const detail = await ledger.services.purchases.getPurchaseDetail(purchase.id);
    expect(detail.supplierName).toBe("Farmlane");
    expect(detail.lots).toHaveLength(2);
  });

  it("lists only on-hand lots with stock as available", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");
    await seedPurchase(ledger, { supplierId: supplier.id, lots: [{ strainName: "Blue Dream", weightLbs: 60 }] });
    await seedPurchase(ledger, { supplierId: supplier.id, status: "ordered", lots: [{ strainName: "Sour Diesel", weightLbs: 40 }] });

    const available = await ledger.services.purchases.getAvailableLots();

    expect(available.map((l) => l.label)).toEqual(["Blue Dream - Farmlane (60 lbs)"]);
  });

  it("refuses lots for an unknown purchase", async () => {
    const ledger = await createLedger();

    await expect(ledger.services.purchases.addLot(
      "missing",
      insertLotSchema.parse({ strainName: "Blue Dream", weightLbs: 10 }),
      actor,
    )).rejects.toBeInstanceOf(NotFoundError);
  });
});
