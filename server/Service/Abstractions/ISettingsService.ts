import type { CostAllocationMethod, KpiTarget, UpdateSettings } from "@shared/schema";
import type { ILedgerStorage } from "./ILedgerStorage";

export interface SettingsSnapshot {
    potencyRate: number;
    numReactors: number;
    reactorCapacity: number;
    runsPerDay: number;
    operatingDays: number;
    dailyThroughputTarget: number;
    weeklyThroughputTarget: number;
    excludeUnpricedBatches: boolean;
    costAllocationMethod: CostAllocationMethod;
    costAllocationThcaPct: number;
}

export interface ISettingsService {
    getSnapshot(storage?: ILedgerStorage): Promise<SettingsSnapshot>;
    updateSettings(update: UpdateSettings): Promise<SettingsSnapshot>;
    seedDefaults(): Promise<void>;
    getKpiTargets(): Promise<KpiTarget[]>;
}
