import type { InsertRun, NewRun, Run } from "@shared/schema";
import { ConsistencyError, NotFoundError } from "../../errors";
import { calculateYields } from "../../calculations/yield";
import { classifyPricing } from "../../calculations/pricingStatus";
import type { Actor, IAuditService } from "../Abstractions/IAuditService";
import type { IInventoryAccountingService } from "../Abstractions/IInventoryAccountingService";
import type { ILedgerStorage, RunDateRange } from "../Abstractions/ILedgerStorage";
import type { IRunCostService } from "../Abstractions/IRunCostService";
import type { IRunService, RunDetail, RunWithPricing } from "../Abstractions/IRunService";
import type { ISettingsService } from "../Abstractions/ISettingsService";
import { toRunCostFields } from "./RunCostService";

function rawRunFields(input: InsertRun): Omit<NewRun, "id" | "createdAt" | "createdBy"> {
    const { inputs: _inputs, ...fields } = input;
    return fields;
}

export class RunService implements IRunService {
    constructor(
        private readonly storage: ILedgerStorage,
        private readonly inventory: IInventoryAccountingService,
        private readonly runCost: IRunCostService,
        private readonly settings: ISettingsService,
        private readonly audit: IAuditService,
    ) { }

    async getRuns(range?: RunDateRange): Promise<RunWithPricing[]> {
        const runs = await this.storage.getRuns(range);
        const inputs = await this.storage.getRunInputsByRunIds(runs.map((run) => run.id));
        const lots = await this.storage.getLotsByIds(Array.from(new Set(inputs.map((input) => input.lotId))));
        const purchases = await this.storage.getPurchasesByIds(Array.from(new Set(lots.map((lot) => lot.purchaseId))));
        const priceByLot = new Map(lots.map((lot) => [lot.id, purchases.find((p) => p.id === lot.purchaseId)?.pricePerLb ?? null]));

        return runs.map((run) => ({
            ...run,
            pricingStatus: classifyPricing(
                inputs.filter((input) => input.runId === run.id).map((input) => ({ pricePerLb: priceByLot.get(input.lotId) ?? null })),
            ),
        }));
    }

    async getRunDetail(id: string): Promise<RunDetail> {
        const run = await this.storage.getRunById(id);
        if (!run) {
            throw new NotFoundError("Run", id);
        }
        const inputs = await this.storage.getRunInputsByRunIds([id]);
        const lots = await this.storage.getLotsByIds(inputs.map((input) => input.lotId));
        const purchases = await this.storage.getPurchasesByIds(Array.from(new Set(lots.map((lot) => lot.purchaseId))));
        const lotsById = new Map(lots.map((lot) => [lot.id, lot]));
        const pricingStatus = classifyPricing(inputs.map((input) => {
            const lot = lotsById.get(input.lotId);
            return { pricePerLb: purchases.find((p) => p.id === lot?.purchaseId)?.pricePerLb ?? null };
        }));

        return {
            run,
            pricingStatus,
            inputs: inputs.map((input) => ({ ...input, lot: lotsById.get(input.lotId) ?? null })),
        };
    }

    async createRun(input: InsertRun, actor: Actor): Promise<Run> {
        return this.storage.transaction(async (tx) => {
            const fields = rawRunFields(input);
            const run = await tx.createRun({ ...fields, ...calculateYields(fields), createdBy: actor.userId });
            return this.finishSave(tx, run, input, actor, "create");
        });
    }

    async updateRun(id: string, input: InsertRun, actor: Actor): Promise<Run> {
        return this.storage.transaction(async (tx) => {
            const existing = await tx.getRunById(id);
            if (!existing) {
                throw new NotFoundError("Run", id);
            }
            await this.inventory.restoreRunInputs(tx, existing);

            const fields = rawRunFields(input);
            const run = await tx.updateRun(id, { ...fields, ...calculateYields(fields) });
            if (!run) {
                throw new ConsistencyError(`Run vanished during update: ${id}`);
            }
            return this.finishSave(tx, run, input, actor, "update");
        });
    }

    async deleteRun(id: string, actor: Actor): Promise<void> {
        await this.storage.transaction(async (tx) => {
            const existing = await tx.getRunById(id);
            if (!existing) {
                throw new NotFoundError("Run", id);
            }
            const restored = await this.inventory.restoreRunInputs(tx, existing);
            await tx.deleteRun(id);
            await this.audit.record(tx, {
                action: "delete",
                entityType: "run",
                entityId: id,
                actor,
                details: {
                    runDate: existing.runDate,
                    restoredInputs: restored.map((i) => ({ lotId: i.lotId, weightLbs: i.weightLbs })),
                },
            });
        });
    }

    // Inputs are consumed before costing so the biomass lines reflect the new set
    private async finishSave(tx: ILedgerStorage, run: Run, input: InsertRun, actor: Actor, action: "create" | "update"): Promise<Run> {
        const consumed = await this.inventory.applyRunInputs(tx, run, input.inputs);
        const settings = await this.settings.getSnapshot(tx);
        const { breakdown, pricingStatus } = await this.runCost.calculateForRun(tx, run, settings);

        const saved = await tx.updateRun(run.id, toRunCostFields(breakdown));
        if (!saved) {
            throw new ConsistencyError(`Run vanished while costing: ${run.id}`);
        }

        await this.audit.record(tx, {
            action,
            entityType: "run",
            entityId: run.id,
            actor,
            details: {
                runDate: saved.runDate,
                inputs: consumed.map((i) => ({ lotId: i.lotId, weightLbs: i.weightLbs })),
                pricingStatus,
            },
        });
        return saved;
    }
}
