import type { CostEntry, CostType, InsertCostEntry } from "@shared/schema";
import type { Actor } from "./IAuditService";

export type CostEntryWithAllocation = CostEntry & {
    periodDryGrams: number;
    costPerGram: number | null;
};

export interface CostEntryListing {
    entries: CostEntryWithAllocation[];
    totalsByType: Record<CostType, number>;
}

export interface ICostEntryService {
    getCostEntries(filters?: { costType?: CostType }): Promise<CostEntryListing>;
    createCostEntry(input: InsertCostEntry, actor: Actor): Promise<CostEntry>;
    updateCostEntry(id: string, input: InsertCostEntry, actor: Actor): Promise<CostEntry>;
    deleteCostEntry(id: string, actor: Actor): Promise<void>;
}
