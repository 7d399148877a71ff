import { describe, expect, it } from "vitest";

import { insertSubmissionSchema, reviewSubmissionSchema } from "@shared/schema";
import { NotFoundError, ValidationError } from "../server/errors";
import { actor, createLedger, seedSupplier, type Ledger } from "./support/fixtures";

const noNotes = reviewSubmissionSchema.parse({});

async function submitFromField(ledger: Ledger, supplierId: string) {
  return ledger.services.submissions.submit(insertSubmissionSchema.parse({
    supplierId,
    purchaseDate: "2026-02-01",
    estimatedPotencyPct: 20,
    pricePerLb: 2,
    notes: "Barn 3",
    lots: [
      { strainName: "Blue Dream", weightLbs: 100 },
      { strainName: "Gelato", weightLbs: 50 },
    ],
  }), actor);
}

describe("field purchase submissions", () => {
  it("stores a pending submission for review", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");

    const submission = await submitFromField(ledger, supplier.id);

    expect(submission.status).toBe("pending");
    expect(submission.submittedBy).toBe("user-1");
    expect(await ledger.services.submissions.getSubmissions({ status: "pending" })).toHaveLength(1);
    expect(await ledger.services.submissions.getSubmissions({ status: "approved" })).toHaveLength(0);
    const created = ledger.storage.auditLogs.find((e) => e.entityType === "purchase_submission");
    expect(created?.details).toEqual({ source: "field_intake", supplier: "Farmlane", lotsCount: 2 });
  });

  it("rejects a submission for an unknown supplier", async () => {
    const ledger = await createLedger();

    await expect(submitFromField(ledger, "missing")).rejects.toMatchObject({
      name: "ValidationError",
      field: "supplierId",
    });
    expect(await ledger.services.submissions.getSubmissions()).toHaveLength(0);
  });

  it("approves into a committed purchase with its lots", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");
    const pending = await submitFromField(ledger, supplier.id);

    const { submission, purchase } = await ledger.services.submissions.approve(
      pending.id,
      reviewSubmissionSchema.parse({ reviewNotes: "Looks good" }),
      actor,
    );

    expect(purchase).toMatchObject({
      supplierId: supplier.id,
      status: "committed",
      statedWeightLbs: 150,
      statedPotencyPct: 20,
      pricePerLb: 2,
      totalCost: 300,
      batchId: "FARML-01FEB26-150",
      notes: `Barn 3\n\nApproved from field submission ${pending.id}`,
    });
    const lots = await ledger.storage.getLots({ purchaseId: purchase.id });
    expect(lots.map((lot) => [lot.strainName, lot.weightLbs, lot.remainingWeightLbs])).toEqual([
      ["Blue Dream", 100, 100],
      ["Gelato", 50, 50],
    ]);

    expect(submission).toMatchObject({
      status: "approved",
      reviewedBy: "user-1",
      reviewNotes: "Looks good",
      approvedPurchaseId: purchase.id,
    });
    const actions = ledger.storage.auditLogs
      .filter((e) => e.entityType === "purchase_submission")
      .map((e) => e.action);
    expect(actions).toEqual(["create", "approve"]);
  });

  it("refuses to review a submission twice", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");
    const pending = await submitFromField(ledger, supplier.id);
    await ledger.services.submissions.approve(pending.id, noNotes, actor);

    await expect(ledger.services.submissions.approve(pending.id, noNotes, actor)).rejects.toThrow(ValidationError);
    await expect(ledger.services.submissions.reject(pending.id, noNotes, actor)).rejects.toThrow(
      "Submission has already been reviewed.",
    );
    expect(await ledger.services.purchases.getPurchases()).toHaveLength(1);
  });

  it("records the reviewer's notes on rejection", async () => {
    const ledger = await createLedger();
    const supplier = await seedSupplier(ledger, "Farmlane");
    const pending = await submitFromField(ledger, supplier.id);

    const rejected = await ledger.services.submissions.reject(
      pending.id,
      reviewSubmissionSchema.parse({ reviewNotes: "Too wet" }),
      actor,
    );

    expect(rejected).toMatchObject({ status: "rejected", reviewNotes: "Too wet", approvedPurchaseId: null });
    expect(await ledger.services.purchases.getPurchases()).toHaveLength(0);
    const audit = ledger.storage.auditLogs.find((e) => e.action === "reject");
    expect(audit?.details).toEqual({ notes: "Too wet" });
  });

  it("reports an unknown submission as not found", async () => {
    const ledger = await createLedger();

    await expect(ledger.services.submissions.reject("missing", noNotes, actor)).rejects.toThrow(NotFoundError);
  });
});
