import type { InsertLot, InsertPurchase, Lot, Purchase, PurchaseStatus } from "@shared/schema";
import type { Actor } from "./IAuditService";
import type { ILedgerStorage } from "./ILedgerStorage";

export interface PurchaseDetail {
    purchase: Purchase;
    supplierName: string;
    lots: Lot[];
}

export interface AvailableLot {
    id: string;
    strain: string;
    supplier: string;
    remaining: number;
    label: string;
}

export interface IPurchaseService {
    getPurchases(filters?: { status?: PurchaseStatus; supplierId?: string }): Promise<Purchase[]>;
    getPurchaseDetail(id: string): Promise<PurchaseDetail>;
    createPurchase(input: InsertPurchase, actor: Actor): Promise<Purchase>;
    updatePurchase(id: string, input: InsertPurchase, actor: Actor): Promise<Purchase>;
    addLot(purchaseId: string, input: InsertLot, actor: Actor): Promise<Lot>;
    getAvailableLots(): Promise<AvailableLot[]>;
    /**
     * Create (or, given `existing`, update) a purchase inside the caller's
     * transaction: prices it, assigns a batch id, syncs the pipeline and audits.
     */
    savePurchase(tx: ILedgerStorage, input: InsertPurchase, actor: Actor, existing?: Purchase): Promise<Purchase>;
}
