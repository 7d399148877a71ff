import type { InsertRun, Lot, Run, RunInput } from "@shared/schema";
import type { PricingStatus } from "../../calculations/pricingStatus";
import type { Actor } from "./IAuditService";
import type { RunDateRange } from "./ILedgerStorage";

export type RunWithPricing = Run & { pricingStatus: PricingStatus };

export interface RunDetail {
    run: Run;
    pricingStatus: PricingStatus;
    inputs: (RunInput & { lot: Lot | null })[];
}

export interface IRunService {
    getRuns(range?: RunDateRange): Promise<RunWithPricing[]>;
    getRunDetail(id: string): Promise<RunDetail>;
    createRun(input: InsertRun, actor: Actor): Promise<Run>;
    updateRun(id: string, input: InsertRun, actor: Actor): Promise<Run>;
    deleteRun(id: string, actor: Actor): Promise<void>;
}
