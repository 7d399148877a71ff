import type { InsertPipelineRecord, PipelineRecord, PipelineStage } from "@shared/schema";
import { ConsistencyError, NotFoundError, ValidationError } from "../../errors";
import type { Actor, IAuditService } from "../Abstractions/IAuditService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { IPipelineService } from "../Abstractions/IPipelineService";
import type { IPipelineSyncService } from "../Abstractions/IPipelineSyncService";

export class PipelineService implements IPipelineService {
    constructor(
        private readonly storage: ILedgerStorage,
        private readonly sync: IPipelineSyncService,
        private readonly audit: IAuditService,
    ) { }

    async getPipelineRecords(filters?: { stage?: PipelineStage }): Promise<PipelineRecord[]> {
        return this.storage.getPipelineRecords(filters);
    }

    async getPipelineRecordById(id: string): Promise<PipelineRecord> {
        const record = await this.storage.getPipelineRecordById(id);
        if (!record) {
            throw new NotFoundError("Pipeline record", id);
        }
        return record;
    }

    async createPipelineRecord(input: InsertPipelineRecord, actor: Actor): Promise<PipelineRecord> {
        return this.storage.transaction(async (tx) => {
            await this.requireSupplier(tx, input.supplierId);
            const record = await tx.createPipelineRecord(input);
            return this.finishSave(tx, record, actor, "create");
        });
    }

    async updatePipelineRecord(id: string, input: InsertPipelineRecord, actor: Actor): Promise<PipelineRecord> {
        return this.storage.transaction(async (tx) => {
            if (!(await tx.getPipelineRecordById(id))) {
                throw new NotFoundError("Pipeline record", id);
            }
            await this.requireSupplier(tx, input.supplierId);
            const record = await tx.updatePipelineRecord(id, input);
            if (!record) {
                throw new ConsistencyError(`Pipeline record vanished during update: ${id}`);
            }
            return this.finishSave(tx, record, actor, "update");
        });
    }

    // The linked purchase, if any, stays: it may already feed runs
    async deletePipelineRecord(id: string, actor: Actor): Promise<void> {
        await this.storage.transaction(async (tx) => {
            const record = await tx.getPipelineRecordById(id);
            if (!record) {
                throw new NotFoundError("Pipeline record", id);
            }
            await tx.deletePipelineRecord(id);
            await this.audit.record(tx, {
                action: "delete",
                entityType: "biomass_pipeline",
                entityId: id,
                actor,
                details: { stage: record.stage, purchaseId: record.purchaseId },
            });
        });
    }

    private async requireSupplier(tx: ILedgerStorage, supplierId: string): Promise<void> {
        if (!(await tx.getSupplierById(supplierId))) {
            throw new ValidationError("Selected supplier was not found.", "supplierId");
        }
    }

    private async finishSave(tx: ILedgerStorage, record: PipelineRecord, actor: Actor, action: "create" | "update"): Promise<PipelineRecord> {
        const purchase = await this.sync.syncFromPipeline(tx, record, actor);
        await this.audit.record(tx, {
            action,
            entityType: "biomass_pipeline",
            entityId: record.id,
            actor,
            details: { stage: record.stage, purchaseId: purchase?.id ?? null },
        });
        // Reload: the sync may have linked a new purchase
        const saved = await tx.getPipelineRecordById(record.id);
        if (!saved) {
            throw new ConsistencyError(`Pipeline record vanished after sync: ${record.id}`);
        }
        return saved;
    }
}
