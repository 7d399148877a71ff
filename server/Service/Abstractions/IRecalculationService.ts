import type { Actor } from "./IAuditService";

export interface RecalculationFailure {
    runId: string;
    runDate: string;
    error: string;
}

export interface RecalculationReport {
    total: number;
    updated: number;
    failures: RecalculationFailure[];
}

export interface IRecalculationService {
    recalculateAll(actor: Actor): Promise<RecalculationReport>;
}
