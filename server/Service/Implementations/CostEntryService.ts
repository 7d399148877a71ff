import type { CostEntry, CostType, InsertCostEntry } from "@shared/schema";
import { NotFoundError } from "../../errors";
import { OperationalRateIndex } from "../../calculations/costAllocation";
import type { Actor, IAuditService } from "../Abstractions/IAuditService";
import type { CostEntryListing, ICostEntryService } from "../Abstractions/ICostEntryService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";

// Cost entry changes do not touch existing runs; run costs refresh on save or Recalculate All
export class CostEntryService implements ICostEntryService {
    constructor(
        private readonly storage: ILedgerStorage,
        private readonly audit: IAuditService,
    ) { }

    async getCostEntries(filters?: { costType?: CostType }): Promise<CostEntryListing> {
        const entries = await this.storage.getCostEntries(filters);
        const runs = await this.storage.getRuns();
        const index = new OperationalRateIndex(entries, runs);

        const totalsByType: Record<CostType, number> = { solvent: 0, personnel: 0, overhead: 0 };
        for (const entry of entries) {
            totalsByType[entry.costType] += entry.totalCost;
        }

        return {
            entries: index.getPeriods().map(({ entry, periodDryGrams }) => ({
                ...entry,
                periodDryGrams,
                costPerGram: periodDryGrams > 0 ? entry.totalCost / periodDryGrams : null,
            })),
            totalsByType,
        };
    }

    async createCostEntry(input: InsertCostEntry, actor: Actor): Promise<CostEntry> {
        return this.storage.transaction(async (tx) => {
            const entry = await tx.createCostEntry({ ...input, createdBy: actor.userId });
            await this.audit.record(tx, {
                action: "create",
                entityType: "cost_entry",
                entityId: entry.id,
                actor,
                details: { costType: entry.costType, totalCost: entry.totalCost, startDate: entry.startDate, endDate: entry.endDate },
            });
            return entry;
        });
    }

    async updateCostEntry(id: string, input: InsertCostEntry, actor: Actor): Promise<CostEntry> {
        return this.storage.transaction(async (tx) => {
            const entry = await tx.updateCostEntry(id, input);
            if (!entry) {
                throw new NotFoundError("Cost entry", id);
            }
            await this.audit.record(tx, {
                action: "update",
                entityType: "cost_entry",
                entityId: id,
                actor,
                details: { costType: entry.costType, totalCost: entry.totalCost, startDate: entry.startDate, endDate: entry.endDate },
            });
            return entry;
        });
    }

    async deleteCostEntry(id: string, actor: Actor): Promise<void> {
        await this.storage.transaction(async (tx) => {
            if (!(await tx.deleteCostEntry(id))) {
                throw new NotFoundError("Cost entry", id);
            }
            await this.audit.record(tx, { action: "delete", entityType: "cost_entry", entityId: id, actor });
        });
    }
}
