import type { ILedgerStorage } from "./Service/Abstractions/ILedgerStorage";
import { AnalyticsService } from "./Service/Implementations/AnalyticsService";
import { AuditService } from "./Service/Implementations/AuditService";
import { BatchIdService } from "./Service/Implementations/BatchIdService";
import { CostEntryService } from "./Service/Implementations/CostEntryService";
import { ImportService } from "./Service/Implementations/ImportService";
import { InventoryAccountingService } from "./Service/Implementations/InventoryAccountingService";
import { PipelineService } from "./Service/Implementations/PipelineService";
import { PipelineSyncService } from "./Service/Implementations/PipelineSyncService";
import { PurchaseService } from "./Service/Implementations/PurchaseService";
import { RecalculationService } from "./Service/Implementations/RecalculationService";
import { RunCostService } from "./Service/Implementations/RunCostService";
import { RunService } from "./Service/Implementations/RunService";
import { SettingsService } from "./Service/Implementations/SettingsService";
import { SubmissionService } from "./Service/Implementations/SubmissionService";
import { SupplierService } from "./Service/Implementations/SupplierService";

export interface LedgerServices {
    settings: SettingsService;
    suppliers: SupplierService;
    pipeline: PipelineService;
    purchases: PurchaseService;
    submissions: SubmissionService;
    runs: RunService;
    costEntries: CostEntryService;
    analytics: AnalyticsService;
    recalculation: RecalculationService;
    imports: ImportService;
}

export function createServices(storage: ILedgerStorage, options: { now?: () => Date } = {}): LedgerServices {
    const audit = new AuditService();
    const settings = new SettingsService(storage);
    const inventory = new InventoryAccountingService();
    const batchIds = new BatchIdService(options.now);
    const runCost = new RunCostService();
    const sync = new PipelineSyncService(batchIds, audit);
    const purchases = new PurchaseService(storage, batchIds, sync, settings, audit);

    return {
        settings,
        suppliers: new SupplierService(storage, audit),
        pipeline: new PipelineService(storage, sync, audit),
        purchases,
        submissions: new SubmissionService(storage, purchases, audit, options.now),
        runs: new RunService(storage, inventory, runCost, settings, audit),
        costEntries: new CostEntryService(storage, audit),
        analytics: new AnalyticsService(storage, settings),
        recalculation: new RecalculationService(storage, runCost, settings, audit),
        imports: new ImportService(storage, inventory, runCost, batchIds, settings, audit),
    };
}
