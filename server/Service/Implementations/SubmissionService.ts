import {
    insertPurchaseSchema,
    type InsertSubmission,
    type PurchaseSubmission,
    type ReviewSubmission,
    type SubmissionStatus,
} from "@shared/schema";
import { ConsistencyError, NotFoundError, ValidationError } from "../../errors";
import type { Actor, IAuditService } from "../Abstractions/IAuditService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { IPurchaseService } from "../Abstractions/IPurchaseService";
import type { ApprovedSubmission, ISubmissionService } from "../Abstractions/ISubmissionService";

export class SubmissionService implements ISubmissionService {
    constructor(
        private readonly storage: ILedgerStorage,
        private readonly purchases: IPurchaseService,
        private readonly audit: IAuditService,
        private readonly now: () => Date = () => new Date(),
    ) { }

    async getSubmissions(filters?: { status?: SubmissionStatus }): Promise<PurchaseSubmission[]> {
        return this.storage.getSubmissions(filters);
    }

    async submit(input: InsertSubmission, actor: Actor): Promise<PurchaseSubmission> {
        return this.storage.transaction(async (tx) => {
            const supplier = await tx.getSupplierById(input.supplierId);
            if (!supplier) {
                throw new ValidationError("Selected supplier was not found.", "supplierId");
            }
            const submission = await tx.createSubmission({ ...input, submittedBy: actor.userId });
            await this.audit.record(tx, {
                action: "create",
                entityType: "purchase_submission",
                entityId: submission.id,
                actor,
                details: { source: "field_intake", supplier: supplier.name, lotsCount: submission.lots.length },
            });
            return submission;
        });
    }

    async approve(id: string, review: ReviewSubmission, actor: Actor): Promise<ApprovedSubmission> {
        return this.storage.transaction(async (tx) => {
            const pending = await this.getPending(tx, id);
            const note = `Approved from field submission ${pending.id}`;

            const purchase = await this.purchases.savePurchase(tx, insertPurchaseSchema.parse({
                supplierId: pending.supplierId,
                purchaseDate: pending.purchaseDate,
                deliveryDate: pending.deliveryDate,
                status: "committed",
                statedWeightLbs: pending.lots.reduce((sum, lot) => sum + lot.weightLbs, 0),
                statedPotencyPct: pending.estimatedPotencyPct,
                pricePerLb: pending.pricePerLb,
                notes: pending.notes ? `${pending.notes}\n\n${note}` : note,
                lots: pending.lots.map((lot) => ({ strainName: lot.strainName, weightLbs: lot.weightLbs })),
            }), actor);

            const submission = await this.review(tx, pending.id, "approved", review, actor, purchase.id);
            await this.audit.record(tx, {
                action: "approve",
                entityType: "purchase_submission",
                entityId: submission.id,
                actor,
                details: { purchaseId: purchase.id, batchId: purchase.batchId },
            });
            return { submission, purchase };
        });
    }

    async reject(id: string, review: ReviewSubmission, actor: Actor): Promise<PurchaseSubmission> {
        return this.storage.transaction(async (tx) => {
            const pending = await this.getPending(tx, id);
            const submission = await this.review(tx, pending.id, "rejected", review, actor, null);
            await this.audit.record(tx, {
                action: "reject",
                entityType: "purchase_submission",
                entityId: submission.id,
                actor,
                details: { notes: submission.reviewNotes },
            });
            return submission;
        });
    }

    private async getPending(tx: ILedgerStorage, id: string): Promise<PurchaseSubmission> {
        const submission = await tx.getSubmissionById(id);
        if (!submission) {
            throw new NotFoundError("Submission", id);
        }
        if (submission.status !== "pending") {
            throw new ValidationError("Submission has already been reviewed.", "status");
        }
        return submission;
    }

    private async review(
        tx: ILedgerStorage,
        id: string,
        status: SubmissionStatus,
        review: ReviewSubmission,
        actor: Actor,
        approvedPurchaseId: string | null,
    ): Promise<PurchaseSubmission> {
        const updated = await tx.updateSubmission(id, {
            status,
            reviewedBy: actor.userId,
            reviewedAt: this.now(),
            reviewNotes: review.reviewNotes ?? null,
            approvedPurchaseId,
        });
        if (!updated) {
            throw new ConsistencyError(`Submission vanished during review: ${id}`);
        }
        return updated;
    }
}
