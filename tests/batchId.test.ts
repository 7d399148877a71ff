import { describe, expect, it } from "vitest";

import {
  BATCH_ID_MAX_LENGTH,
  effectiveBatchDate,
  ensureUniqueBatchId,
  generateBatchId,
  suffixedBatchId,
  supplierPrefix,
} from "../server/calculations/batchId";
import { GenerationExhaustedError, ValidationError } from "../server/errors";
import { insertPurchaseSchema } from "@shared/schema";
import { actor, createLedger, seedPurchase, seedSupplier } from "./support/fixtures";

describe("batch id generation", () => {
  it("builds the supplier prefix from alphanumerics", () => {
    expect(supplierPrefix("Farmlane Growers")).toBe("FARML");
    expect(supplierPrefix("A-1")).toBe("XXXA1");
    expect(supplierPrefix("")).toBe("BATCH");
    expect(supplierPrefix("!!!")).toBe("BATCH");
    expect(supplierPrefix(null)).toBe("BATCH");
  });

  it("prefers delivery date over purchase date", () => {
    expect(effectiveBatchDate("2026-03-01", "2026-02-01")).toBe("2026-03-01");
    expect(effectiveBatchDate(null, "2026-02-01")).toBe("2026-02-01");
    expect(effectiveBatchDate(null, null)).toBeNull();
  });

  it("formats prefix, date and rounded weight", () => {
    expect(generateBatchId("Farmlane", "2026-02-15", 199.6)).toBe("FARML-15FEB26-200");
  });

  it("falls back to today and zero weight", () => {
    expect(generateBatchId("Oak", null, undefined, new Date(2026, 2, 5))).toBe("XXOAK-05MAR26-0");
  });

  it("walks suffixes until a free candidate is found", async () => {
    const taken = new Set(["A", "A-2"]);
    await expect(ensureUniqueBatchId("a", async (id) => taken.has(id))).resolves.toBe("A-3");
  });

  it("gives up after the attempt limit", async () => {
    await expect(ensureUniqueBatchId("A", async () => true, 3)).rejects.toBeInstanceOf(GenerationExhaustedError);
  });

  it("shortens the base so suffixed ids stay within the length limit", () => {
    const base = "B".repeat(BATCH_ID_MAX_LENGTH);
    const candidate = suffixedBatchId(base, 12);

    expect(candidate).toHaveLength(BATCH_ID_MAX_LENGTH);
    expect(candidate.endsWith("-12")).toBe(true);
  });
});

describe("batch id assignment on purchases", () => {
  it("gives colliding generated ids distinct suffixes", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");

    const ids: string[] = [];
    for (let i = 0; i < 3; i++) {
      const { purchase } = await seedPurchase(ledger, {
        supplierId: supplier.id,
        purchaseDate: "2026-02-15",
        lots: [{ strainName: "Blue Dream", weightLbs: 200 }],
      });
      ids.push(purchase.batchId);
    }

    expect(ids).toEqual(["FARML-15FEB26-200", "FARML-15FEB26-200-2", "FARML-15FEB26-200-3"]);
  });

  it("normalizes user-supplied ids and rejects one held by another purchase", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");
    const draft = { supplierId: supplier.id, purchaseDate: "2026-02-01", statedWeightLbs: 50 };

    const first = await ledger.services.purchases.createPurchase(
      insertPurchaseSchema.parse({ ...draft, batchId: " lot-1 " }),
      actor,
    );
    expect(first.batchId).toBe("LOT-1");

    const duplicate = ledger.services.purchases.createPurchase(insertPurchaseSchema.parse({ ...draft, batchId: "Lot-1" }), actor);
    await expect(duplicate).rejects.toBeInstanceOf(ValidationError);
    await expect(duplicate).rejects.toMatchObject({ field: "batchId" });
    expect(await ledger.storage.getPurchases()).toHaveLength(1);

    const edited = await ledger.services.purchases.updatePurchase(
      first.id,
      insertPurchaseSchema.parse({ ...draft, statedWeightLbs: 60, batchId: "LOT-1" }),
      actor,
    );
    expect(edited.batchId).toBe("LOT-1");
    expect(edited.statedWeightLbs).toBe(60);
  });

  it("keeps the assigned id when an edit does not send one", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");
    const { purchase } = await seedPurchase(ledger, {
      supplierId: supplier.id,
      purchaseDate: "2026-02-15",
      lots: [{ strainName: "Blue Dream", weightLbs: 200 }],
    });

    const edited = await ledger.services.purchases.updatePurchase(
      purchase.id,
      insertPurchaseSchema.parse({ supplierId: supplier.id, purchaseDate: "2026-03-01", statedWeightLbs: 250 }),
      actor,
    );

    expect(edited.batchId).toBe("FARML-15FEB26-200");
  });
});
