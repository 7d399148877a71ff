import { ConsistencyError, isRecoverableRecordError } from "../../errors";
import { log, logError } from "../../log";
import { calculateRunCost, OperationalRateIndex } from "../../calculations/costAllocation";
import { calculateYields } from "../../calculations/yield";
import type { Actor, IAuditService } from "../Abstractions/IAuditService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { IRecalculationService, RecalculationFailure, RecalculationReport } from "../Abstractions/IRecalculationService";
import type { IRunCostService } from "../Abstractions/IRunCostService";
import type { ISettingsService } from "../Abstractions/ISettingsService";
import { toRunCostFields } from "./RunCostService";

export class RecalculationService implements IRecalculationService {
    constructor(
        private readonly storage: ILedgerStorage,
        private readonly runCost: IRunCostService,
        private readonly settings: ISettingsService,
        private readonly audit: IAuditService,
    ) { }

    /**
     * Recomputes yields and costs for every run from current lots, purchases,
     * cost entries and settings. Each run commits on its own; a run that fails
     * validation or consistency checks is reported and the rest continue.
     */
    async recalculateAll(actor: Actor): Promise<RecalculationReport> {
        const settings = await this.settings.getSnapshot();
        const runs = await this.storage.getRuns();
        const rateIndex = new OperationalRateIndex(await this.storage.getCostEntries(), runs);
        const resolveLines = await this.runCost.loadCostLines(this.storage, runs.map((run) => run.id));

        let updated = 0;
        const failures: RecalculationFailure[] = [];
        for (const run of runs) {
            try {
                await this.storage.transaction(async (tx) => {
                    const breakdown = calculateRunCost({
                        outputs: run,
                        lines: resolveLines(run.id),
                        opRate: rateIndex.rateFor(run.runDate),
                        settings,
                    });
                    const saved = await tx.updateRun(run.id, { ...calculateYields(run), ...toRunCostFields(breakdown) });
                    if (!saved) {
                        throw new ConsistencyError(`Run vanished during recalculation: ${run.id}`);
                    }
                });
                updated++;
            } catch (error) {
                if (!isRecoverableRecordError(error)) {
                    throw error;
                }
                logError(`Recalculation failed for run ${run.id}`, error, "recalculate");
                failures.push({ runId: run.id, runDate: run.runDate, error: error.message });
            }
        }

        await this.audit.record(this.storage, {
            action: "update",
            entityType: "run",
            entityId: "all",
            actor,
            details: { operation: "recalculate_all", total: runs.length, updated, failed: failures.length },
        });
        log(`Recalculated ${updated}/${runs.length} runs (${failures.length} failed)`, "recalculate");
        return { total: runs.length, updated, failures };
    }
}
