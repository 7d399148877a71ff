import type { ILedgerStorage } from "./ILedgerStorage";

export interface BatchIdRequest {
    requested?: string | null;
    supplierName: string;
    deliveryDate: string | null;
    purchaseDate: string | null;
    weightLbs: number | null;
    // Excluded from the uniqueness check (the purchase being edited)
    purchaseId?: string;
}

export interface IBatchIdService {
    assignBatchId(storage: ILedgerStorage, request: BatchIdRequest): Promise<string>;
}
