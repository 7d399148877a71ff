import type {
    AuditLog,
    CostEntry,
    CostType,
    KpiTarget,
    Lot,
    NewAuditLog,
    NewCostEntry,
    NewKpiTarget,
    NewLot,
    NewPipelineRecord,
    NewPurchase,
    NewRun,
    NewRunInput,
    NewSupplier,
    PipelineRecord,
    PipelineStage,
    Purchase,
    PurchaseStatus,
    PurchaseSubmission,
    NewPurchaseSubmission,
    Run,
    RunInput,
    SubmissionStatus,
    Supplier,
    SystemSetting,
} from "@shared/schema";

export interface RunDateRange {
    startDate?: string;
    endDate?: string;
}

/**
 * Persistence for every ledger entity. Implementations must make
 * `transaction` all-or-nothing: a throw inside `work` undoes every write
 * made through the storage handed to it.
 */
export interface ILedgerStorage {
    transaction<T>(work: (storage: ILedgerStorage) => Promise<T>): Promise<T>;

    // Supplier operations
    getSuppliers(filters?: { activeOnly?: boolean }): Promise<Supplier[]>;
    getSupplierById(id: string): Promise<Supplier | undefined>;
    getSupplierByName(name: string): Promise<Supplier | undefined>;
    createSupplier(supplier: NewSupplier): Promise<Supplier>;
    updateSupplier(id: string, supplier: Partial<NewSupplier>): Promise<Supplier | undefined>;

    // Biomass pipeline operations
    getPipelineRecords(filters?: { stage?: PipelineStage }): Promise<PipelineRecord[]>;
    getPipelineRecordById(id: string): Promise<PipelineRecord | undefined>;
    getPipelineRecordByPurchaseId(purchaseId: string): Promise<PipelineRecord | undefined>;
    createPipelineRecord(record: NewPipelineRecord): Promise<PipelineRecord>;
    updatePipelineRecord(id: string, record: Partial<NewPipelineRecord>): Promise<PipelineRecord | undefined>;
    deletePipelineRecord(id: string): Promise<boolean>;

    // Purchase operations
    getPurchases(filters?: { status?: PurchaseStatus; supplierId?: string }): Promise<Purchase[]>;
    getPurchaseById(id: string): Promise<Purchase | undefined>;
    getPurchasesByIds(ids: string[]): Promise<Purchase[]>;
    getPurchaseByBatchId(batchId: string): Promise<Purchase | undefined>;
    getLatestPurchaseForSupplier(supplierId: string): Promise<Purchase | undefined>;
    createPurchase(purchase: NewPurchase): Promise<Purchase>;
    updatePurchase(id: string, purchase: Partial<NewPurchase>): Promise<Purchase | undefined>;

    // Lot operations
    getLots(filters?: { purchaseId?: string; availableOnly?: boolean }): Promise<Lot[]>;
    getLotById(id: string): Promise<Lot | undefined>;
    getLotsByIds(ids: string[]): Promise<Lot[]>;
    createLot(lot: NewLot): Promise<Lot>;
    updateLot(id: string, lot: Partial<NewLot>): Promise<Lot | undefined>;

    // Run operations
    getRuns(range?: RunDateRange): Promise<Run[]>;
    getRunById(id: string): Promise<Run | undefined>;
    createRun(run: NewRun): Promise<Run>;
    updateRun(id: string, run: Partial<NewRun>): Promise<Run | undefined>;
    deleteRun(id: string): Promise<boolean>;

    // Run input operations
    getRunInputsByRunIds(runIds: string[]): Promise<RunInput[]>;
    createRunInput(input: NewRunInput): Promise<RunInput>;
    deleteRunInputsByRunId(runId: string): Promise<number>;

    // Cost entry operations
    getCostEntries(filters?: { costType?: CostType }): Promise<CostEntry[]>;
    getCostEntriesCovering(date: string): Promise<CostEntry[]>;
    createCostEntry(entry: NewCostEntry): Promise<CostEntry>;
    updateCostEntry(id: string, entry: Partial<NewCostEntry>): Promise<CostEntry | undefined>;
    deleteCostEntry(id: string): Promise<boolean>;

    // Field purchase submissions
    getSubmissions(filters?: { status?: SubmissionStatus }): Promise<PurchaseSubmission[]>;
    getSubmissionById(id: string): Promise<PurchaseSubmission | undefined>;
    createSubmission(submission: NewPurchaseSubmission): Promise<PurchaseSubmission>;
    updateSubmission(id: string, submission: Partial<NewPurchaseSubmission>): Promise<PurchaseSubmission | undefined>;

    // Settings operations
    getSettings(): Promise<SystemSetting[]>;
    upsertSetting(key: string, value: string, description?: string): Promise<SystemSetting>;

    // KPI target operations
    getKpiTargets(): Promise<KpiTarget[]>;
    getKpiTargetByName(kpiName: string): Promise<KpiTarget | undefined>;
    createKpiTarget(target: NewKpiTarget): Promise<KpiTarget>;

    // Audit log (write-only)
    createAuditLog(entry: NewAuditLog): Promise<AuditLog>;
}
