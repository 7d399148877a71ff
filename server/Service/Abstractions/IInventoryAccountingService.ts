import type { Run, RunInput, RunInputDraft } from "@shared/schema";
import type { ILedgerStorage } from "./ILedgerStorage";

export interface IInventoryAccountingService {
    // Validates and consumes lot weight, persisting one RunInput per line
    applyRunInputs(storage: ILedgerStorage, run: Run, inputs: RunInputDraft[]): Promise<RunInput[]>;
    // Returns every active input's weight to its lot and removes the inputs
    restoreRunInputs(storage: ILedgerStorage, run: Run): Promise<RunInput[]>;
}
