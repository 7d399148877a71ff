import type { NewPurchase, PipelineRecord, Purchase } from "@shared/schema";
import { ConsistencyError, ValidationError } from "../../errors";
import { purchaseStatusToStage, stageCreatesPurchase, stageToPurchaseStatus } from "../../calculations/stageMapping";
import { purchaseTotalCost } from "../../calculations/purchaseCosting";
import type { Actor, IAuditService } from "../Abstractions/IAuditService";
import type { IBatchIdService } from "../Abstractions/IBatchIdService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { IPipelineSyncService } from "../Abstractions/IPipelineSyncService";

export class PipelineSyncService implements IPipelineSyncService {
    constructor(
        private readonly batchIds: IBatchIdService,
        private readonly audit: IAuditService,
    ) { }

    async syncFromPipeline(storage: ILedgerStorage, record: PipelineRecord, actor: Actor): Promise<Purchase | undefined> {
        let purchase: Purchase | undefined;
        if (record.purchaseId) {
            purchase = await storage.getPurchaseById(record.purchaseId);
            if (!purchase) {
                throw new ConsistencyError(`Pipeline record ${record.id} links to a missing purchase`, {
                    pipelineId: record.id,
                    purchaseId: record.purchaseId,
                });
            }
        } else if (!stageCreatesPurchase(record.stage)) {
            return undefined;
        }

        const supplier = await storage.getSupplierById(record.supplierId);
        if (!supplier) {
            throw new ValidationError("Selected supplier was not found.", "supplierId");
        }

        // A zero committed weight means "not set yet", same as the declared fallback
        const weight = record.committedWeightLbs || record.declaredWeightLbs || 0;
        const pricePerLb = record.committedPricePerLb ?? record.declaredPricePerLb ?? null;
        const fields = {
            supplierId: supplier.id,
            purchaseDate: record.committedOn ?? record.availabilityDate,
            deliveryDate: record.committedDeliveryDate,
            status: stageToPurchaseStatus(record.stage),
            statedWeightLbs: weight,
            statedPotencyPct: record.estimatedPotencyPct,
            testedPotencyPct: record.testedPotencyPct,
            pricePerLb,
        } satisfies Partial<NewPurchase>;

        let action: "create" | "update";
        if (!purchase) {
            if (!(weight > 0)) {
                throw new ValidationError("A committed or declared weight is required before the purchase can be created.", "committedWeightLbs");
            }
            const batchId = await this.batchIds.assignBatchId(storage, {
                supplierName: supplier.name,
                deliveryDate: fields.deliveryDate,
                purchaseDate: fields.purchaseDate,
                weightLbs: weight,
            });
            purchase = await storage.createPurchase({
                ...fields,
                batchId,
                totalCost: purchaseTotalCost(weight, null, pricePerLb),
                notes: `Created from biomass pipeline (${record.id})`,
            });
            await storage.updatePipelineRecord(record.id, { purchaseId: purchase.id });
            action = "create";
        } else {
            const updated = await storage.updatePurchase(purchase.id, {
                ...fields,
                totalCost: purchaseTotalCost(weight, purchase.actualWeightLbs, pricePerLb),
            });
            if (!updated) {
                throw new ConsistencyError(`Purchase vanished during pipeline sync: ${purchase.id}`);
            }
            purchase = updated;
            action = "update";
        }

        await this.audit.record(storage, {
            action,
            entityType: "purchase",
            entityId: purchase.id,
            actor,
            details: { source: "biomass_pipeline", pipelineId: record.id, stage: record.stage, status: purchase.status },
        });
        return purchase;
    }

    async syncFromPurchase(storage: ILedgerStorage, purchase: Purchase, actor: Actor): Promise<PipelineRecord | undefined> {
        const linked = await storage.getPipelineRecordByPurchaseId(purchase.id);
        if (!linked) return undefined;

        const stage = purchaseStatusToStage(purchase.status);
        const updated = await storage.updatePipelineRecord(linked.id, {
            stage,
            committedOn: purchase.purchaseDate,
            committedDeliveryDate: purchase.deliveryDate,
            committedWeightLbs: purchase.actualWeightLbs ?? purchase.statedWeightLbs,
            committedPricePerLb: purchase.pricePerLb,
        });
        if (!updated) {
            throw new ConsistencyError(`Pipeline record vanished during purchase sync: ${linked.id}`);
        }

        await this.audit.record(storage, {
            action: "update",
            entityType: "biomass_pipeline",
            entityId: linked.id,
            actor,
            details: { source: "purchase", purchaseId: purchase.id, stage },
        });
        return updated;
    }
}
