import type { PipelineRecord, Purchase } from "@shared/schema";
import type { Actor } from "./IAuditService";
import type { ILedgerStorage } from "./ILedgerStorage";

// Each direction is a single hop: neither procedure calls the other or a full save path
export interface IPipelineSyncService {
    syncFromPipeline(storage: ILedgerStorage, record: PipelineRecord, actor: Actor): Promise<Purchase | undefined>;
    syncFromPurchase(storage: ILedgerStorage, purchase: Purchase, actor: Actor): Promise<PipelineRecord | undefined>;
}
