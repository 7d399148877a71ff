import type { Lot, Run, RunInput, RunInputDraft } from "@shared/schema";
import { ConsistencyError, ValidationError } from "../../errors";
import type { IInventoryAccountingService } from "../Abstractions/IInventoryAccountingService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";

// Float slack for weight comparisons (lbs)
export const WEIGHT_EPSILON = 1e-6;

export class InventoryAccountingService implements IInventoryAccountingService {
    async applyRunInputs(storage: ILedgerStorage, run: Run, inputs: RunInputDraft[]): Promise<RunInput[]> {
        const lots = await storage.getLotsByIds(Array.from(new Set(inputs.map((input) => input.lotId))));
        const lotsById = new Map(lots.map((lot) => [lot.id, lot]));
        // Tracks what is left as the same lot may appear on several lines
        const remaining = new Map(lots.map((lot) => [lot.id, lot.remainingWeightLbs]));

        for (const input of inputs) {
            if (!Number.isFinite(input.weightLbs) || input.weightLbs <= 0) {
                throw new ValidationError("Input weight must be greater than zero.", "inputs");
            }
            const lot = lotsById.get(input.lotId);
            if (!lot) {
                throw new ValidationError(`Lot not found: ${input.lotId}`, "inputs");
            }
            const available = remaining.get(lot.id) ?? 0;
            if (input.weightLbs > available + WEIGHT_EPSILON) {
                throw new ValidationError(
                    `Lot ${lot.strainName} has only ${available.toFixed(1)} lbs remaining; ${input.weightLbs.toFixed(1)} lbs requested.`,
                    "inputs",
                );
            }
            remaining.set(lot.id, Math.max(0, available - input.weightLbs));
        }

        const created: RunInput[] = [];
        for (const input of inputs) {
            created.push(await storage.createRunInput({ runId: run.id, lotId: input.lotId, weightLbs: input.weightLbs }));
        }
        for (const [lotId, remainingWeightLbs] of Array.from(remaining.entries())) {
            const updated = await storage.updateLot(lotId, { remainingWeightLbs });
            if (!updated) {
                throw new ConsistencyError(`Lot disappeared while consuming inventory: ${lotId}`, { runId: run.id, lotId });
            }
        }
        return created;
    }

    async restoreRunInputs(storage: ILedgerStorage, run: Run): Promise<RunInput[]> {
        const inputs = await storage.getRunInputsByRunIds([run.id]);
        if (inputs.length === 0) return [];

        const lots = await storage.getLotsByIds(Array.from(new Set(inputs.map((input) => input.lotId))));
        const lotsById = new Map<string, Lot>(lots.map((lot) => [lot.id, lot]));
        const restored = new Map<string, number>();

        for (const input of inputs) {
            const lot = lotsById.get(input.lotId);
            if (!lot) {
                throw new ConsistencyError(`Run ${run.id} consumed a lot that no longer exists: ${input.lotId}`, { runId: run.id, lotId: input.lotId });
            }
            const next = (restored.get(lot.id) ?? lot.remainingWeightLbs) + input.weightLbs;
            if (next > lot.weightLbs + WEIGHT_EPSILON) {
                throw new ConsistencyError(`Restoring run ${run.id} would leave lot ${lot.id} above its original weight`, {
                    runId: run.id,
                    lotId: lot.id,
                    weightLbs: lot.weightLbs,
                    restoredLbs: next,
                });
            }
            restored.set(lot.id, Math.min(lot.weightLbs, next));
        }

        for (const [lotId, remainingWeightLbs] of Array.from(restored.entries())) {
            await storage.updateLot(lotId, { remainingWeightLbs });
        }
        await storage.deleteRunInputsByRunId(run.id);
        return inputs;
    }
}
