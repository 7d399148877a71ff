import type { KpiDirection, Lot, Purchase } from "@shared/schema";
import type { KpiColor, PerformanceSummary } from "../../calculations/analytics";

export const DASHBOARD_PERIODS = ['today', '7', '30', '90', 'all'] as const;
export type DashboardPeriod = typeof DASHBOARD_PERIODS[number];

export interface KpiCard {
    kpiName: string;
    displayName: string;
    target: number;
    actual: number | null;
    color: KpiColor;
    unit: string;
    direction: KpiDirection;
}

export interface DashboardView {
    period: DashboardPeriod;
    startDate: string;
    excludeUnpriced: boolean;
    kpiActuals: Record<string, number | null>;
    kpiCards: KpiCard[];
    totalRuns: number;
    totalLbs: number;
    totalDryOutput: number;
    onHandLbs: number;
}

export interface LastBatch {
    runId: string;
    runDate: string;
    overallYieldPct: number | null;
    thcaYieldPct: number | null;
    hteYieldPct: number | null;
    costPerGramCombined: number | null;
}

export interface SupplierPerformance {
    supplierId: string;
    supplierName: string;
    isActive: boolean;
    allTime: PerformanceSummary;
    recent: PerformanceSummary;
    lastBatch: LastBatch | null;
}

export type StrainPerformance = PerformanceSummary & {
    strainName: string;
    supplierId: string;
    supplierName: string;
};

export interface InventorySummary {
    onHandLots: (Lot & { supplierName: string; batchId: string })[];
    inTransit: Purchase[];
    totalOnHandLbs: number;
    totalInTransitLbs: number;
    daysOfSupply: number;
}

export interface IAnalyticsService {
    getDashboard(period: DashboardPeriod, today?: Date): Promise<DashboardView>;
    getSupplierPerformance(options?: { recentDays?: number; today?: Date }): Promise<SupplierPerformance[]>;
    getStrainPerformance(options?: { days?: number; today?: Date }): Promise<StrainPerformance[]>;
    getInventorySummary(): Promise<InventorySummary>;
}
