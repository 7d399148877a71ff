import {
    ON_HAND_PURCHASE_STATUSES,
    type InsertLot,
    type InsertPurchase,
    type Lot,
    type Purchase,
    type PurchaseStatus,
} from "@shared/schema";
import { ConsistencyError, NotFoundError, ValidationError } from "../../errors";
import { autoPricePerLb, purchaseTotalCost, trueUpAmount } from "../../calculations/purchaseCosting";
import type { Actor, IAuditService } from "../Abstractions/IAuditService";
import type { IBatchIdService } from "../Abstractions/IBatchIdService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { IPipelineSyncService } from "../Abstractions/IPipelineSyncService";
import type { AvailableLot, IPurchaseService, PurchaseDetail } from "../Abstractions/IPurchaseService";
import type { ISettingsService } from "../Abstractions/ISettingsService";

export class PurchaseService implements IPurchaseService {
    constructor(
        private readonly storage: ILedgerStorage,
        private readonly batchIds: IBatchIdService,
        private readonly sync: IPipelineSyncService,
        private readonly settings: ISettingsService,
        private readonly audit: IAuditService,
    ) { }

    async getPurchases(filters?: { status?: PurchaseStatus; supplierId?: string }): Promise<Purchase[]> {
        return this.storage.getPurchases(filters);
    }

    async getPurchaseDetail(id: string): Promise<PurchaseDetail> {
        const purchase = await this.storage.getPurchaseById(id);
        if (!purchase) {
            throw new NotFoundError("Purchase", id);
        }
        const supplier = await this.storage.getSupplierById(purchase.supplierId);
        const lots = await this.storage.getLots({ purchaseId: id });
        return { purchase, supplierName: supplier?.name ?? "Unknown", lots };
    }

    async createPurchase(input: InsertPurchase, actor: Actor): Promise<Purchase> {
        return this.storage.transaction(async (tx) => this.savePurchase(tx, input, actor));
    }

    async updatePurchase(id: string, input: InsertPurchase, actor: Actor): Promise<Purchase> {
        return this.storage.transaction(async (tx) => {
            const existing = await tx.getPurchaseById(id);
            if (!existing) {
                throw new NotFoundError("Purchase", id);
            }
            return this.savePurchase(tx, input, actor, existing);
        });
    }

    async addLot(purchaseId: string, input: InsertLot, actor: Actor): Promise<Lot> {
        return this.storage.transaction(async (tx) => {
            if (!(await tx.getPurchaseById(purchaseId))) {
                throw new NotFoundError("Purchase", purchaseId);
            }
            return this.createLot(tx, purchaseId, input, actor);
        });
    }

    async getAvailableLots(): Promise<AvailableLot[]> {
        const lots = await this.storage.getLots({ availableOnly: true });
        const purchases = await this.storage.getPurchasesByIds(Array.from(new Set(lots.map((lot) => lot.purchaseId))));
        const suppliers = await this.storage.getSuppliers();
        const purchasesById = new Map(purchases.map((p) => [p.id, p]));
        const supplierNames = new Map(suppliers.map((s) => [s.id, s.name]));

        return lots.flatMap((lot) => {
            const purchase = purchasesById.get(lot.purchaseId);
            if (!purchase || !ON_HAND_PURCHASE_STATUSES.includes(purchase.status)) return [];
            const supplier = supplierNames.get(purchase.supplierId) ?? "Unknown";
            return [{
                id: lot.id,
                strain: lot.strainName,
                supplier,
                remaining: lot.remainingWeightLbs,
                label: `${lot.strainName} - ${supplier} (${lot.remainingWeightLbs.toFixed(0)} lbs)`,
            }];
        });
    }

    async savePurchase(tx: ILedgerStorage, input: InsertPurchase, actor: Actor, existing?: Purchase): Promise<Purchase> {
        const supplier = await tx.getSupplierById(input.supplierId);
        if (!supplier) {
            throw new ValidationError("Selected supplier was not found.", "supplierId");
        }
        const { potencyRate } = await this.settings.getSnapshot(tx);
        const { lots, batchId: requestedBatchId, ...fields } = input;

        const pricePerLb = fields.pricePerLb ?? autoPricePerLb(fields.statedPotencyPct, potencyRate);
        const trueUp = trueUpAmount(fields.statedPotencyPct, fields.testedPotencyPct, fields.actualWeightLbs, potencyRate);
        const computed = {
            pricePerLb,
            totalCost: purchaseTotalCost(fields.statedWeightLbs, fields.actualWeightLbs, pricePerLb),
            trueUpAmount: trueUp,
            trueUpStatus: fields.trueUpStatus ?? existing?.trueUpStatus ?? (trueUp != null ? "pending" : null),
        };

        // An assigned batch id only changes when the caller sends a new one
        let batchId = existing?.batchId;
        if (requestedBatchId || !batchId) {
            batchId = await this.batchIds.assignBatchId(tx, {
                requested: requestedBatchId,
                supplierName: supplier.name,
                deliveryDate: fields.deliveryDate ?? null,
                purchaseDate: fields.purchaseDate,
                weightLbs: fields.actualWeightLbs ?? fields.statedWeightLbs,
                purchaseId: existing?.id,
            });
        }

        let purchase: Purchase;
        if (existing) {
            const updated = await tx.updatePurchase(existing.id, { ...fields, ...computed, batchId });
            if (!updated) {
                throw new ConsistencyError(`Purchase vanished during update: ${existing.id}`);
            }
            purchase = updated;
        } else {
            purchase = await tx.createPurchase({ ...fields, ...computed, batchId });
            for (const lot of lots ?? []) {
                await this.createLot(tx, purchase.id, lot, actor);
            }
        }

        await this.sync.syncFromPurchase(tx, purchase, actor);
        await this.audit.record(tx, {
            action: existing ? "update" : "create",
            entityType: "purchase",
            entityId: purchase.id,
            actor,
            details: { batchId: purchase.batchId, status: purchase.status, totalCost: purchase.totalCost },
        });
        return purchase;
    }

    private async createLot(tx: ILedgerStorage, purchaseId: string, input: InsertLot, actor: Actor): Promise<Lot> {
        const lot = await tx.createLot({ ...input, purchaseId, remainingWeightLbs: input.weightLbs });
        await this.audit.record(tx, {
            action: "create",
            entityType: "lot",
            entityId: lot.id,
            actor,
            details: { purchaseId, strainName: lot.strainName, weightLbs: lot.weightLbs },
        });
        return lot;
    }
}
