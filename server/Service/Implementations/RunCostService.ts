import type { NewRun, Run, RunInput } from "@shared/schema";
import { ConsistencyError } from "../../errors";
import {
    calculateRunCost,
    OperationalRateIndex,
    type BiomassCostLine,
    type RunCostBreakdown,
} from "../../calculations/costAllocation";
import { classifyPricing } from "../../calculations/pricingStatus";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { CostLineResolver, IRunCostService, RunCostResult } from "../Abstractions/IRunCostService";
import type { SettingsSnapshot } from "../Abstractions/ISettingsService";

// Derived cost columns of a run, as persisted
export function toRunCostFields(breakdown: RunCostBreakdown): Partial<NewRun> {
    return {
        biomassCost: breakdown.biomassCost,
        opCostPerGram: breakdown.opRate,
        totalCost: breakdown.totalCost,
        costPerGramCombined: breakdown.costPerGramCombined,
        costPerGramThca: breakdown.costPerGramThca,
        costPerGramHte: breakdown.costPerGramHte,
    };
}

export class RunCostService implements IRunCostService {
    /**
     * Loads inputs, lots and purchases for the given runs in three queries.
     * The resolver throws ConsistencyError for a run whose input points at a
     * missing lot or purchase, so a batch caller can isolate that run.
     */
    async loadCostLines(storage: ILedgerStorage, runIds: string[]): Promise<CostLineResolver> {
        const inputs = await storage.getRunInputsByRunIds(runIds);
        const lots = await storage.getLotsByIds(Array.from(new Set(inputs.map((input) => input.lotId))));
        const purchases = await storage.getPurchasesByIds(Array.from(new Set(lots.map((lot) => lot.purchaseId))));

        const lotsById = new Map(lots.map((lot) => [lot.id, lot]));
        const purchasesById = new Map(purchases.map((purchase) => [purchase.id, purchase]));
        const inputsByRun = new Map<string, RunInput[]>();
        for (const input of inputs) {
            const list = inputsByRun.get(input.runId) ?? [];
            list.push(input);
            inputsByRun.set(input.runId, list);
        }

        return (runId) => (inputsByRun.get(runId) ?? []).map((input): BiomassCostLine => {
            const lot = lotsById.get(input.lotId);
            if (!lot) {
                throw new ConsistencyError(`Run input references a missing lot: ${input.lotId}`, { runId, lotId: input.lotId });
            }
            const purchase = purchasesById.get(lot.purchaseId);
            if (!purchase) {
                throw new ConsistencyError(`Lot references a missing purchase: ${lot.purchaseId}`, { runId, lotId: lot.id });
            }
            return { weightLbs: input.weightLbs, pricePerLb: purchase.pricePerLb };
        });
    }

    async calculateForRun(storage: ILedgerStorage, run: Run, settings: SettingsSnapshot): Promise<RunCostResult> {
        const resolveLines = await this.loadCostLines(storage, [run.id]);
        const lines = resolveLines(run.id);

        // Only the periods covering this run matter; their grams come from every run inside them
        const covering = await storage.getCostEntriesCovering(run.runDate);
        let opRate = 0;
        if (covering.length > 0) {
            const startDate = covering.reduce((min, entry) => (entry.startDate < min ? entry.startDate : min), covering[0].startDate);
            const endDate = covering.reduce((max, entry) => (entry.endDate > max ? entry.endDate : max), covering[0].endDate);
            const runsInPeriods = await storage.getRuns({ startDate, endDate });
            opRate = new OperationalRateIndex(covering, runsInPeriods).rateFor(run.runDate);
        }

        return {
            breakdown: calculateRunCost({ outputs: run, lines, opRate, settings }),
            pricingStatus: classifyPricing(lines),
        };
    }
}
