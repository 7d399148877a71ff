import { isValid, parse } from "date-fns";
import type { ImportRow, Lot, Supplier } from "@shared/schema";
import { ConsistencyError, GenerationExhaustedError, ValidationError } from "../../errors";
import { log } from "../../log";
import { toIsoDate } from "../../calculations/analytics";
import { GRAMS_PER_LB, calculateYields } from "../../calculations/yield";
import type { Actor, IAuditService } from "../Abstractions/IAuditService";
import type { IBatchIdService } from "../Abstractions/IBatchIdService";
import type { IImportService, ImportReport } from "../Abstractions/IImportService";
import type { IInventoryAccountingService } from "../Abstractions/IInventoryAccountingService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { IRunCostService } from "../Abstractions/IRunCostService";
import type { ISettingsService } from "../Abstractions/ISettingsService";
import { toRunCostFields } from "./RunCostService";

// Month/day forms without a year take the reference date's year
const DATE_FORMATS: [RegExp, string][] = [
    [/^\d{4}-\d{1,2}-\d{1,2}$/, "yyyy-M-d"],
    [/^\d{1,2}\/\d{1,2}\/\d{4}$/, "M/d/yyyy"],
    [/^\d{1,2}-\d{1,2}-\d{4}$/, "M-d-yyyy"],
    [/^\d{1,2}\/\d{1,2}\/\d{2}$/, "M/d/yy"],
    [/^\d{1,2}\/\d{1,2}$/, "M/d"],
    [/^\d{1,2}-\d{1,2}$/, "M-d"],
];

// Accepts the date spellings found in run sheets; null when unparseable
export function parseImportDate(raw: string | null | undefined, referenceDate: Date = new Date()): string | null {
    const value = (raw ?? "").trim().replaceAll("_", "/");
    const match = DATE_FORMATS.find(([pattern]) => pattern.test(value));
    if (!match) return null;
    const parsed = parse(value, match[1], referenceDate);
    return isValid(parsed) ? toIsoDate(parsed) : null;
}

function sameText(a: string, b: string): boolean {
    return a.trim().toLowerCase() === b.trim().toLowerCase();
}

// Identifies the sheet row a run came from, so a re-import finds it even when the run drew no lot
export function buildImportKey(runDate: string, strain: string, source: string): string {
    return [runDate, strain.trim().toLowerCase(), source.trim().toLowerCase()].join("|");
}

type RowOutcome = "imported" | "skipped";

export class ImportService implements IImportService {
    constructor(
        private readonly storage: ILedgerStorage,
        private readonly inventory: IInventoryAccountingService,
        private readonly runCost: IRunCostService,
        private readonly batchIds: IBatchIdService,
        private readonly settings: ISettingsService,
        private readonly audit: IAuditService,
    ) { }

    async importRows(rows: ImportRow[], actor: Actor): Promise<ImportReport> {
        const report: ImportReport = { imported: 0, skipped: 0, errors: 0 };

        for (const row of rows) {
            const runDate = parseImportDate(row.runDate);
            if (!runDate || !row.strain) {
                report.skipped++;
                continue;
            }
            try {
                const outcome = await this.storage.transaction((tx) => this.importRow(tx, row, runDate, actor));
                report[outcome]++;
            } catch (error) {
                if (!(error instanceof ValidationError || error instanceof GenerationExhaustedError)) {
                    throw error;
                }
                log(`Import row ${runDate} / ${row.strain} rejected: ${error.message}`, "import");
                report.errors++;
            }
        }

        log(`Import complete: ${report.imported} imported, ${report.skipped} skipped, ${report.errors} errors`, "import");
        return report;
    }

    private async importRow(tx: ILedgerStorage, row: ImportRow, runDate: string, actor: Actor): Promise<RowOutcome> {
        if (await this.isDuplicate(tx, row, runDate)) {
            return "skipped";
        }

        const lbsRan = row.lbsRan ?? (row.gramsRan != null ? row.gramsRan / GRAMS_PER_LB : null);
        const lot = row.source ? await this.resolveLot(tx, row, runDate, actor) : undefined;

        const fields = {
            runDate,
            reactorNumber: 1,
            bioInHouseLbs: row.bioInHouseLbs ?? null,
            bioInReactorLbs: lbsRan,
            butaneInHouseLbs: row.butaneInHouseLbs ?? null,
            solventRatio: row.solventRatio ?? null,
            wetHteG: row.wetHteG ?? null,
            wetThcaG: row.wetThcaG ?? null,
            dryHteG: row.dryHteG ?? null,
            dryThcaG: row.dryThcaG ?? null,
        };
        let run = await tx.createRun({
            ...fields,
            ...calculateYields(fields),
            importKey: buildImportKey(runDate, row.strain, row.source),
            createdBy: actor.userId,
        });

        if (lot && lbsRan != null && lbsRan > 0) {
            // Imported history has no receiving record, so the lot grows by what the run used
            const grown = await tx.updateLot(lot.id, {
                weightLbs: lot.weightLbs + lbsRan,
                remainingWeightLbs: lot.remainingWeightLbs + lbsRan,
            });
            if (!grown) {
                throw new ConsistencyError(`Lot vanished during import: ${lot.id}`);
            }
            await this.inventory.applyRunInputs(tx, run, [{ lotId: lot.id, weightLbs: lbsRan }]);
        }

        const { breakdown } = await this.runCost.calculateForRun(tx, run, await this.settings.getSnapshot(tx));
        const costed = await tx.updateRun(run.id, toRunCostFields(breakdown));
        if (!costed) {
            throw new ConsistencyError(`Run vanished during import: ${run.id}`);
        }
        run = costed;

        await this.audit.record(tx, {
            action: "create",
            entityType: "run",
            entityId: run.id,
            actor,
            details: { source: "import", strain: row.strain, supplier: row.source || null },
        });
        return "imported";
    }

    /**
     * A row is already in when an earlier import stored the same key, or when a
     * run on that date drew a lot of the same strain (and the same supplier, when
     * the row names one).
     */
    private async isDuplicate(tx: ILedgerStorage, row: ImportRow, runDate: string): Promise<boolean> {
        const runs = await tx.getRuns({ startDate: runDate, endDate: runDate });
        if (runs.length === 0) return false;
        const key = buildImportKey(runDate, row.strain, row.source);
        if (runs.some((run) => run.importKey === key)) return true;

        const inputs = await tx.getRunInputsByRunIds(runs.map((run) => run.id));
        const lots = (await tx.getLotsByIds(Array.from(new Set(inputs.map((i) => i.lotId)))))
            .filter((lot) => sameText(lot.strainName, row.strain));
        if (lots.length === 0) return false;
        if (!row.source) return true;

        const purchases = await tx.getPurchasesByIds(Array.from(new Set(lots.map((lot) => lot.purchaseId))));
        for (const purchase of purchases) {
            const supplier = await tx.getSupplierById(purchase.supplierId);
            if (supplier && sameText(supplier.name, row.source)) return true;
        }
        return false;
    }

    private async resolveLot(tx: ILedgerStorage, row: ImportRow, runDate: string, actor: Actor): Promise<Lot> {
        const supplier = await this.resolveSupplier(tx, row.source, actor);

        let purchase = await tx.getLatestPurchaseForSupplier(supplier.id);
        if (!purchase) {
            const batchId = await this.batchIds.assignBatchId(tx, {
                supplierName: supplier.name,
                deliveryDate: null,
                purchaseDate: runDate,
                weightLbs: 0,
            });
            purchase = await tx.createPurchase({
                supplierId: supplier.id,
                purchaseDate: runDate,
                status: "complete",
                statedWeightLbs: 0,
                pricePerLb: row.pricePerLb ?? null,
                batchId,
                notes: "Created by run import",
            });
            await this.audit.record(tx, {
                action: "create",
                entityType: "purchase",
                entityId: purchase.id,
                actor,
                details: { source: "import", batchId },
            });
        }

        const existing = (await tx.getLots({ purchaseId: purchase.id })).find((lot) => sameText(lot.strainName, row.strain));
        if (existing) return existing;
        return tx.createLot({ purchaseId: purchase.id, strainName: row.strain, weightLbs: 0, remainingWeightLbs: 0 });
    }

    private async resolveSupplier(tx: ILedgerStorage, name: string, actor: Actor): Promise<Supplier> {
        const existing = await tx.getSupplierByName(name);
        if (existing) return existing;
        const supplier = await tx.createSupplier({ name: name.trim() });
        await this.audit.record(tx, {
            action: "create",
            entityType: "supplier",
            entityId: supplier.id,
            actor,
            details: { source: "import" },
        });
        return supplier;
    }
}
