import type { Run } from "@shared/schema";
import type { BiomassCostLine, RunCostBreakdown } from "../../calculations/costAllocation";
import type { PricingStatus } from "../../calculations/pricingStatus";
import type { ILedgerStorage } from "./ILedgerStorage";
import type { SettingsSnapshot } from "./ISettingsService";

export type CostLineResolver = (runId: string) => BiomassCostLine[];

export interface RunCostResult {
    breakdown: RunCostBreakdown;
    pricingStatus: PricingStatus;
}

export interface IRunCostService {
    loadCostLines(storage: ILedgerStorage, runIds: string[]): Promise<CostLineResolver>;
    calculateForRun(storage: ILedgerStorage, run: Run, settings: SettingsSnapshot): Promise<RunCostResult>;
}
