import {
    COST_ALLOCATION_METHODS,
    type CostAllocationMethod,
    type KpiTarget,
    type NewKpiTarget,
    type SystemSetting,
    type UpdateSettings,
} from "@shared/schema";
import { log } from "../../log";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { ISettingsService, SettingsSnapshot } from "../Abstractions/ISettingsService";

interface SettingDefinition {
    key: string;
    field: keyof SettingsSnapshot;
    defaultValue: string;
    description: string;
}

export const SETTING_DEFINITIONS: readonly SettingDefinition[] = [
    { key: "potency_rate", field: "potencyRate", defaultValue: "1.50", description: "Default $/lb per potency point" },
    { key: "num_reactors", field: "numReactors", defaultValue: "2", description: "Number of reactors" },
    { key: "reactor_capacity", field: "reactorCapacity", defaultValue: "100", description: "Reactor capacity in lbs" },
    { key: "runs_per_day", field: "runsPerDay", defaultValue: "5", description: "Target runs per reactor per day" },
    { key: "operating_days", field: "operatingDays", defaultValue: "7", description: "Operating days per week" },
    { key: "daily_throughput_target", field: "dailyThroughputTarget", defaultValue: "500", description: "Daily lbs target" },
    { key: "weekly_throughput_target", field: "weeklyThroughputTarget", defaultValue: "3500", description: "Weekly lbs target" },
    { key: "exclude_unpriced_batches", field: "excludeUnpricedBatches", defaultValue: "0", description: "Exclude unpriced batches from analytics" },
    { key: "cost_allocation_method", field: "costAllocationMethod", defaultValue: "per_gram_uniform", description: "How run cost is split between THCA and HTE" },
    { key: "cost_allocation_thca_pct", field: "costAllocationThcaPct", defaultValue: "50", description: "THCA share of run cost for custom_split" },
];

export const DEFAULT_KPI_TARGETS: readonly NewKpiTarget[] = [
    { kpiName: "thca_yield_pct", displayName: "THCA Yield %", targetValue: 7, greenThreshold: 7, yellowThreshold: 6, direction: "higher_is_better", unit: "%" },
    { kpiName: "hte_yield_pct", displayName: "HTE Yield %", targetValue: 5, greenThreshold: 5, yellowThreshold: 4, direction: "higher_is_better", unit: "%" },
    { kpiName: "overall_yield_pct", displayName: "Overall Yield %", targetValue: 12, greenThreshold: 12, yellowThreshold: 10, direction: "higher_is_better", unit: "%" },
    { kpiName: "cost_per_potency_point", displayName: "Cost per Potency Point", targetValue: 1.5, greenThreshold: 1.35, yellowThreshold: 1.65, direction: "lower_is_better", unit: "$/pt" },
    { kpiName: "cost_per_gram_combined", displayName: "Cost per Gram (Combined)", targetValue: 5, greenThreshold: 4, yellowThreshold: 6, direction: "lower_is_better", unit: "$/g" },
    { kpiName: "cost_per_gram_thca", displayName: "Cost per Gram (THCA)", targetValue: 5, greenThreshold: 4, yellowThreshold: 6, direction: "lower_is_better", unit: "$/g" },
    { kpiName: "cost_per_gram_hte", displayName: "Cost per Gram (HTE)", targetValue: 5, greenThreshold: 4, yellowThreshold: 6, direction: "lower_is_better", unit: "$/g" },
    { kpiName: "weekly_throughput", displayName: "Weekly Throughput", targetValue: 3500, greenThreshold: 3500, yellowThreshold: 3000, direction: "higher_is_better", unit: "lbs" },
];

function parseNumber(raw: string | undefined, fallback: number): number {
    if (raw == null || raw.trim() === "") return fallback;
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
}

function parseFlag(raw: string | undefined): boolean {
    return raw != null && ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function isAllocationMethod(value: string): value is CostAllocationMethod {
    return COST_ALLOCATION_METHODS.some((method) => method === value);
}

// "uniform" is the short form older settings rows carry
export function normalizeAllocationMethod(raw: string | undefined): CostAllocationMethod {
    const value = (raw ?? "").trim().toLowerCase();
    if (value === "uniform") return "per_gram_uniform";
    return isAllocationMethod(value) ? value : "per_gram_uniform";
}

export function clampPercent(value: number): number {
    return Math.min(100, Math.max(0, value));
}

export function buildSettingsSnapshot(rows: SystemSetting[]): SettingsSnapshot {
    const raw = new Map(rows.map((row) => [row.key, row.value]));
    const value = (key: string): string | undefined => raw.get(key);
    const numeric = (key: string): number => {
        const definition = SETTING_DEFINITIONS.find((d) => d.key === key);
        return parseNumber(value(key), parseNumber(definition?.defaultValue, 0));
    };

    return {
        potencyRate: numeric("potency_rate"),
        numReactors: numeric("num_reactors"),
        reactorCapacity: numeric("reactor_capacity"),
        runsPerDay: numeric("runs_per_day"),
        operatingDays: numeric("operating_days"),
        dailyThroughputTarget: numeric("daily_throughput_target"),
        weeklyThroughputTarget: numeric("weekly_throughput_target"),
        excludeUnpricedBatches: parseFlag(value("exclude_unpriced_batches")),
        costAllocationMethod: normalizeAllocationMethod(value("cost_allocation_method")),
        costAllocationThcaPct: clampPercent(numeric("cost_allocation_thca_pct")),
    };
}

function serialize(field: keyof SettingsSnapshot, update: UpdateSettings): string | undefined {
    switch (field) {
        case "excludeUnpricedBatches":
            return update.excludeUnpricedBatches == null ? undefined : update.excludeUnpricedBatches ? "1" : "0";
        case "costAllocationMethod":
            return update.costAllocationMethod == null ? undefined : normalizeAllocationMethod(update.costAllocationMethod);
        case "costAllocationThcaPct":
            return update.costAllocationThcaPct == null ? undefined : String(clampPercent(update.costAllocationThcaPct));
        default: {
            const value = update[field];
            return value == null ? undefined : String(value);
        }
    }
}

export class SettingsService implements ISettingsService {
    constructor(private readonly storage: ILedgerStorage) { }

    async getSnapshot(storage: ILedgerStorage = this.storage): Promise<SettingsSnapshot> {
        return buildSettingsSnapshot(await storage.getSettings());
    }

    async updateSettings(update: UpdateSettings): Promise<SettingsSnapshot> {
        return this.storage.transaction(async (tx) => {
            for (const definition of SETTING_DEFINITIONS) {
                const value = serialize(definition.field, update);
                if (value !== undefined) {
                    await tx.upsertSetting(definition.key, value, definition.description);
                }
            }
            return this.getSnapshot(tx);
        });
    }

    // Inserts missing settings and KPI targets; existing values are left alone
    async seedDefaults(): Promise<void> {
        await this.storage.transaction(async (tx) => {
            const existing = new Set((await tx.getSettings()).map((row) => row.key));
            for (const definition of SETTING_DEFINITIONS) {
                if (!existing.has(definition.key)) {
                    await tx.upsertSetting(definition.key, definition.defaultValue, definition.description);
                }
            }
            let seeded = 0;
            for (const target of DEFAULT_KPI_TARGETS) {
                if (!(await tx.getKpiTargetByName(target.kpiName))) {
                    await tx.createKpiTarget(target);
                    seeded++;
                }
            }
            if (seeded > 0) {
                log(`Seeded ${seeded} KPI targets`, "settings");
            }
        });
    }

    async getKpiTargets(): Promise<KpiTarget[]> {
        return this.storage.getKpiTargets();
    }
}
