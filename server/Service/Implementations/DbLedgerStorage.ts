import {
    auditLogs,
    biomassPipeline,
    costEntries,
    kpiTargets,
    purchaseLots,
    purchases,
    purchaseSubmissions,
    runInputs,
    runs,
    suppliers,
    systemSettings,
    type AuditLog,
    type CostEntry,
    type CostType,
    type KpiTarget,
    type Lot,
    type NewAuditLog,
    type NewCostEntry,
    type NewKpiTarget,
    type NewLot,
    type NewPipelineRecord,
    type NewPurchase,
    type NewRun,
    type NewRunInput,
    type NewSupplier,
    type PipelineRecord,
    type PipelineStage,
    type Purchase,
    type PurchaseStatus,
    type PurchaseSubmission,
    type NewPurchaseSubmission,
    type Run,
    type RunInput,
    type SubmissionStatus,
    type Supplier,
    type SystemSetting,
} from "@shared/schema";
import type * as schema from "@shared/schema";
import { and, asc, desc, eq, gt, gte, inArray, lte, sql, type SQL } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import { ValidationError } from "../../errors";
import type { ILedgerStorage, RunDateRange } from "../Abstractions/ILedgerStorage";

// Both the pooled database and a transaction handle satisfy this
export type LedgerDatabase = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const PG_UNIQUE_VIOLATION = "23505";

function isUniqueViolation(error: unknown): boolean {
    if (typeof error !== "object" || error === null) return false;
    if ("code" in error && error.code === PG_UNIQUE_VIOLATION) return true;
    return "cause" in error && isUniqueViolation(error.cause);
}

function batchIdConflict(error: unknown, batchId: string | undefined): never {
    if (isUniqueViolation(error)) {
        throw new ValidationError(`Batch ID '${batchId ?? ""}' already exists. Please choose a unique Batch ID.`, "batchId");
    }
    throw error;
}

export class DbLedgerStorage implements ILedgerStorage {
    constructor(private readonly db: LedgerDatabase) { }

    async transaction<T>(work: (storage: ILedgerStorage) => Promise<T>): Promise<T> {
        return this.db.transaction(async (tx) => work(new DbLedgerStorage(tx)));
    }

    // Supplier operations
    async getSuppliers(filters?: { activeOnly?: boolean }): Promise<Supplier[]> {
        const query = this.db.select().from(suppliers);
        if (filters?.activeOnly) {
            return await query.where(eq(suppliers.isActive, true)).orderBy(asc(suppliers.name));
        }
        return await query.orderBy(asc(suppliers.name));
    }

    async getSupplierById(id: string): Promise<Supplier | undefined> {
        const result = await this.db.select().from(suppliers).where(eq(suppliers.id, id));
        return result[0];
    }

    async getSupplierByName(name: string): Promise<Supplier | undefined> {
        const result = await this.db.select()
            .from(suppliers)
            .where(sql`LOWER(TRIM(${suppliers.name})) = LOWER(TRIM(${name}))`)
            .orderBy(asc(suppliers.createdAt))
            .limit(1);
        return result[0];
    }

    async createSupplier(supplier: NewSupplier): Promise<Supplier> {
        const result = await this.db.insert(suppliers).values(supplier).returning();
        return result[0];
    }

    async updateSupplier(id: string, supplier: Partial<NewSupplier>): Promise<Supplier | undefined> {
        const result = await this.db
            .update(suppliers)
            .set(supplier)
            .where(eq(suppliers.id, id))
            .returning();
        return result[0];
    }

    // Biomass pipeline operations
    async getPipelineRecords(filters?: { stage?: PipelineStage }): Promise<PipelineRecord[]> {
        const query = this.db.select().from(biomassPipeline);
        const ordered = [desc(biomassPipeline.availabilityDate), asc(biomassPipeline.createdAt)];
        if (filters?.stage) {
            return await query.where(eq(biomassPipeline.stage, filters.stage)).orderBy(...ordered);
        }
        return await query.orderBy(...ordered);
    }

    async getPipelineRecordById(id: string): Promise<PipelineRecord | undefined> {
        const result = await this.db.select().from(biomassPipeline).where(eq(biomassPipeline.id, id));
        return result[0];
    }

    async getPipelineRecordByPurchaseId(purchaseId: string): Promise<PipelineRecord | undefined> {
        const result = await this.db.select().from(biomassPipeline).where(eq(biomassPipeline.purchaseId, purchaseId));
        return result[0];
    }

    async createPipelineRecord(record: NewPipelineRecord): Promise<PipelineRecord> {
        const result = await this.db.insert(biomassPipeline).values(record).returning();
        return result[0];
    }

    async updatePipelineRecord(id: string, record: Partial<NewPipelineRecord>): Promise<PipelineRecord | undefined> {
        const result = await this.db
            .update(biomassPipeline)
            .set({ ...record, updatedAt: new Date() })
            .where(eq(biomassPipeline.id, id))
            .returning();
        return result[0];
    }

    async deletePipelineRecord(id: string): Promise<boolean> {
        const result = await this.db.delete(biomassPipeline)
            .where(eq(biomassPipeline.id, id))
            .returning({ id: biomassPipeline.id });
        return result.length > 0;
    }

    // Purchase operations
    async getPurchases(filters?: { status?: PurchaseStatus; supplierId?: string }): Promise<Purchase[]> {
        const conditions: SQL[] = [];
        if (filters?.status) {
            conditions.push(eq(purchases.status, filters.status));
        }
        if (filters?.supplierId) {
            conditions.push(eq(purchases.supplierId, filters.supplierId));
        }
        return await this.db.select()
            .from(purchases)
            .where(conditions.length > 0 ? and(...conditions) : undefined)
            .orderBy(desc(purchases.purchaseDate), desc(purchases.createdAt));
    }

    async getPurchaseById(id: string): Promise<Purchase | undefined> {
        const result = await this.db.select().from(purchases).where(eq(purchases.id, id));
        return result[0];
    }

    async getPurchasesByIds(ids: string[]): Promise<Purchase[]> {
        if (ids.length === 0) return [];
        return await this.db.select().from(purchases).where(inArray(purchases.id, ids));
    }

    async getPurchaseByBatchId(batchId: string): Promise<Purchase | undefined> {
        const result = await this.db.select().from(purchases).where(eq(purchases.batchId, batchId));
        return result[0];
    }

    async getLatestPurchaseForSupplier(supplierId: string): Promise<Purchase | undefined> {
        const result = await this.db.select()
            .from(purchases)
            .where(eq(purchases.supplierId, supplierId))
            .orderBy(desc(purchases.purchaseDate), desc(purchases.createdAt))
            .limit(1);
        return result[0];
    }

    async createPurchase(purchase: NewPurchase): Promise<Purchase> {
        try {
            const result = await this.db.insert(purchases).values(purchase).returning();
            return result[0];
        } catch (error) {
            return batchIdConflict(error, purchase.batchId);
        }
    }

    async updatePurchase(id: string, purchase: Partial<NewPurchase>): Promise<Purchase | undefined> {
        try {
            const result = await this.db
                .update(purchases)
                .set({ ...purchase, updatedAt: new Date() })
                .where(eq(purchases.id, id))
                .returning();
            return result[0];
        } catch (error) {
            return batchIdConflict(error, purchase.batchId);
        }
    }

    // Lot operations
    async getLots(filters?: { purchaseId?: string; availableOnly?: boolean }): Promise<Lot[]> {
        const conditions: SQL[] = [];
        if (filters?.purchaseId) {
            conditions.push(eq(purchaseLots.purchaseId, filters.purchaseId));
        }
        if (filters?.availableOnly) {
            conditions.push(gt(purchaseLots.remainingWeightLbs, 0));
        }
        return await this.db.select()
            .from(purchaseLots)
            .where(conditions.length > 0 ? and(...conditions) : undefined)
            .orderBy(asc(purchaseLots.createdAt));
    }

    async getLotById(id: string): Promise<Lot | undefined> {
        const result = await this.db.select().from(purchaseLots).where(eq(purchaseLots.id, id));
        return result[0];
    }

    async getLotsByIds(ids: string[]): Promise<Lot[]> {
        if (ids.length === 0) return [];
        return await this.db.select().from(purchaseLots).where(inArray(purchaseLots.id, ids));
    }

    async createLot(lot: NewLot): Promise<Lot> {
        const result = await this.db.insert(purchaseLots).values(lot).returning();
        return result[0];
    }

    async updateLot(id: string, lot: Partial<NewLot>): Promise<Lot | undefined> {
        const result = await this.db
            .update(purchaseLots)
            .set(lot)
            .where(eq(purchaseLots.id, id))
            .returning();
        return result[0];
    }

    // Run operations
    async getRuns(range?: RunDateRange): Promise<Run[]> {
        const conditions: SQL[] = [];
        if (range?.startDate) {
            conditions.push(gte(runs.runDate, range.startDate));
        }
        if (range?.endDate) {
            conditions.push(lte(runs.runDate, range.endDate));
        }
        return await this.db.select()
            .from(runs)
            .where(conditions.length > 0 ? and(...conditions) : undefined)
            .orderBy(asc(runs.runDate), asc(runs.createdAt));
    }

    async getRunById(id: string): Promise<Run | undefined> {
        const result = await this.db.select().from(runs).where(eq(runs.id, id));
        return result[0];
    }

    async createRun(run: NewRun): Promise<Run> {
        const result = await this.db.insert(runs).values(run).returning();
        return result[0];
    }

    async updateRun(id: string, run: Partial<NewRun>): Promise<Run | undefined> {
        const result = await this.db
            .update(runs)
            .set({ ...run, updatedAt: new Date() })
            .where(eq(runs.id, id))
            .returning();
        return result[0];
    }

    async deleteRun(id: string): Promise<boolean> {
        const result = await this.db.delete(runs).where(eq(runs.id, id)).returning({ id: runs.id });
        return result.length > 0;
    }

    // Run input operations
    async getRunInputsByRunIds(runIds: string[]): Promise<RunInput[]> {
        if (runIds.length === 0) return [];
        return await this.db.select().from(runInputs).where(inArray(runInputs.runId, runIds));
    }

    async createRunInput(input: NewRunInput): Promise<RunInput> {
        const result = await this.db.insert(runInputs).values(input).returning();
        return result[0];
    }

    async deleteRunInputsByRunId(runId: string): Promise<number> {
        const result = await this.db.delete(runInputs)
            .where(eq(runInputs.runId, runId))
            .returning({ id: runInputs.id });
        return result.length;
    }

    // Cost entry operations
    async getCostEntries(filters?: { costType?: CostType }): Promise<CostEntry[]> {
        return await this.db.select()
            .from(costEntries)
            .where(filters?.costType ? eq(costEntries.costType, filters.costType) : undefined)
            .orderBy(desc(costEntries.startDate));
    }

    async getCostEntriesCovering(date: string): Promise<CostEntry[]> {
        return await this.db.select()
            .from(costEntries)
            .where(and(lte(costEntries.startDate, date), gte(costEntries.endDate, date)));
    }

    async createCostEntry(entry: NewCostEntry): Promise<CostEntry> {
        const result = await this.db.insert(costEntries).values(entry).returning();
        return result[0];
    }

    async updateCostEntry(id: string, entry: Partial<NewCostEntry>): Promise<CostEntry | undefined> {
        const result = await this.db
            .update(costEntries)
            .set(entry)
            .where(eq(costEntries.id, id))
            .returning();
        return result[0];
    }

    async deleteCostEntry(id: string): Promise<boolean> {
        const result = await this.db.delete(costEntries)
            .where(eq(costEntries.id, id))
            .returning({ id: costEntries.id });
        return result.length > 0;
    }

    // Field purchase submissions
    async getSubmissions(filters?: { status?: SubmissionStatus }): Promise<PurchaseSubmission[]> {
        return await this.db.select()
            .from(purchaseSubmissions)
            .where(filters?.status ? eq(purchaseSubmissions.status, filters.status) : undefined)
            .orderBy(desc(purchaseSubmissions.submittedAt));
    }

    async getSubmissionById(id: string): Promise<PurchaseSubmission | undefined> {
        const result = await this.db.select().from(purchaseSubmissions).where(eq(purchaseSubmissions.id, id));
        return result[0];
    }

    async createSubmission(submission: NewPurchaseSubmission): Promise<PurchaseSubmission> {
        const result = await this.db.insert(purchaseSubmissions).values(submission).returning();
        return result[0];
    }

    async updateSubmission(id: string, submission: Partial<NewPurchaseSubmission>): Promise<PurchaseSubmission | undefined> {
        const result = await this.db
            .update(purchaseSubmissions)
            .set(submission)
            .where(eq(purchaseSubmissions.id, id))
            .returning();
        return result[0];
    }

    // Settings operations
    async getSettings(): Promise<SystemSetting[]> {
        return await this.db.select().from(systemSettings);
    }

    async upsertSetting(key: string, value: string, description?: string): Promise<SystemSetting> {
        const result = await this.db
            .insert(systemSettings)
            .values({ key, value, description })
            .onConflictDoUpdate({
                target: systemSettings.key,
                set: { value, updatedAt: new Date() },
            })
            .returning();
        return result[0];
    }

    // KPI target operations
    async getKpiTargets(): Promise<KpiTarget[]> {
        return await this.db.select().from(kpiTargets).orderBy(asc(kpiTargets.kpiName));
    }

    async getKpiTargetByName(kpiName: string): Promise<KpiTarget | undefined> {
        const result = await this.db.select().from(kpiTargets).where(eq(kpiTargets.kpiName, kpiName));
        return result[0];
    }

    async createKpiTarget(target: NewKpiTarget): Promise<KpiTarget> {
        const result = await this.db.insert(kpiTargets).values(target).returning();
        return result[0];
    }

    // Audit log
    async createAuditLog(entry: NewAuditLog): Promise<AuditLog> {
        const result = await this.db.insert(auditLogs).values(entry).returning();
        return result[0];
    }
}
