import { differenceInCalendarDays, parseISO } from "date-fns";
import {
    IN_TRANSIT_PURCHASE_STATUSES,
    ON_HAND_PURCHASE_STATUSES,
    type Purchase,
    type Run,
    type RunInput,
} from "@shared/schema";
import {
    applyPricingFilter,
    applyWindow,
    evaluateKpi,
    groupByStrainAndSupplier,
    groupBySupplier,
    mean,
    summarizeRuns,
    toIsoDate,
    windowStartDate,
    type RunFact,
    type RunSource,
} from "../../calculations/analytics";
import { classifyPricing } from "../../calculations/pricingStatus";
import type {
    DashboardPeriod,
    DashboardView,
    IAnalyticsService,
    InventorySummary,
    StrainPerformance,
    SupplierPerformance,
} from "../Abstractions/IAnalyticsService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { ISettingsService } from "../Abstractions/ISettingsService";

const DEFAULT_RECENT_DAYS = 90;

interface LoadedFacts {
    facts: RunFact[];
    purchasesById: Map<string, Purchase>;
}

function dashboardStartDate(period: DashboardPeriod, runs: Run[], today: Date): string {
    switch (period) {
        case "today":
            return toIsoDate(today);
        case "all":
            return runs.reduce((min, run) => (run.runDate < min ? run.runDate : min), toIsoDate(today));
        default:
            return windowStartDate(Number(period), today);
    }
}

export class AnalyticsService implements IAnalyticsService {
    constructor(
        private readonly storage: ILedgerStorage,
        private readonly settings: ISettingsService,
    ) { }

    async getDashboard(period: DashboardPeriod, today: Date = new Date()): Promise<DashboardView> {
        const settings = await this.settings.getSnapshot();
        const allRuns = period === "all" ? await this.storage.getRuns() : [];
        const startDate = dashboardStartDate(period, allRuns, today);
        const runs = period === "all" ? allRuns : await this.storage.getRuns({ startDate });

        const loaded = await this.loadFacts(runs);
        const facts = applyPricingFilter(loaded.facts, settings.excludeUnpricedBatches);
        const summary = summarizeRuns(facts.map((fact) => fact.run));

        const days = Math.max(differenceInCalendarDays(today, parseISO(startDate)), 1);
        const weeklyThroughput = summary.runCount > 0 ? summary.totalLbs / Math.max(days / 7, 1) : null;

        const feedingPurchases = new Set(facts.flatMap((fact) => fact.sources.map((source) => source.purchaseId)));
        const costPerPotencyPoint = mean(Array.from(feedingPurchases).map((id) => {
            const purchase = loaded.purchasesById.get(id);
            const potency = purchase?.testedPotencyPct ?? purchase?.statedPotencyPct;
            return purchase?.pricePerLb != null && potency != null && potency > 0 ? purchase.pricePerLb / potency : null;
        }));

        const kpiActuals: Record<string, number | null> = {
            thca_yield_pct: summary.avgThcaYieldPct,
            hte_yield_pct: summary.avgHteYieldPct,
            overall_yield_pct: summary.avgOverallYieldPct,
            cost_per_potency_point: costPerPotencyPoint,
            cost_per_gram_combined: summary.avgCostPerGram,
            cost_per_gram_thca: summary.avgCostPerGramThca,
            cost_per_gram_hte: summary.avgCostPerGramHte,
            weekly_throughput: weeklyThroughput,
        };

        const targets = await this.settings.getKpiTargets();
        const inventory = await this.getInventorySummary();

        return {
            period,
            startDate,
            excludeUnpriced: settings.excludeUnpricedBatches,
            kpiActuals,
            kpiCards: targets.map((target) => {
                const actual = kpiActuals[target.kpiName] ?? null;
                return {
                    kpiName: target.kpiName,
                    displayName: target.displayName,
                    target: target.targetValue,
                    actual,
                    color: evaluateKpi(target, actual),
                    unit: target.unit ?? "",
                    direction: target.direction,
                };
            }),
            totalRuns: summary.runCount,
            totalLbs: summary.totalLbs,
            totalDryOutput: summary.totalDryThcaG + summary.totalDryHteG,
            onHandLbs: inventory.totalOnHandLbs,
        };
    }

    async getSupplierPerformance(options?: { recentDays?: number; today?: Date }): Promise<SupplierPerformance[]> {
        const recentDays = options?.recentDays ?? DEFAULT_RECENT_DAYS;
        const today = options?.today ?? new Date();
        const facts = await this.performanceFacts();
        const groups = groupBySupplier(facts);
        const suppliers = await this.storage.getSuppliers();

        return suppliers.map((supplier) => {
            const group = groups.get(supplier.id) ?? [];
            const last = applyWindow(group, { kind: "last_batch" })[0];
            return {
                supplierId: supplier.id,
                supplierName: supplier.name,
                isActive: supplier.isActive,
                allTime: summarizeRuns(group.map((fact) => fact.run)),
                recent: summarizeRuns(applyWindow(group, { kind: "days", days: recentDays }, today).map((fact) => fact.run)),
                lastBatch: last
                    ? {
                        runId: last.run.id,
                        runDate: last.run.runDate,
                        overallYieldPct: last.run.overallYieldPct,
                        thcaYieldPct: last.run.thcaYieldPct,
                        hteYieldPct: last.run.hteYieldPct,
                        costPerGramCombined: last.run.costPerGramCombined,
                    }
                    : null,
            };
        });
    }

    // No `days` means all time
    async getStrainPerformance(options?: { days?: number; today?: Date }): Promise<StrainPerformance[]> {
        let facts = await this.performanceFacts();
        if (options?.days != null) {
            facts = applyWindow(facts, { kind: "days", days: options.days }, options.today);
        }

        return groupByStrainAndSupplier(facts)
            .map((group) => ({
                strainName: group.strainName,
                supplierId: group.supplierId,
                supplierName: group.supplierName,
                ...summarizeRuns(group.facts.map((fact) => fact.run)),
            }))
            .sort((a, b) => {
                if (a.avgOverallYieldPct == null) return b.avgOverallYieldPct == null ? 0 : 1;
                if (b.avgOverallYieldPct == null) return -1;
                return b.avgOverallYieldPct - a.avgOverallYieldPct;
            });
    }

    async getInventorySummary(): Promise<InventorySummary> {
        const settings = await this.settings.getSnapshot();
        const lots = await this.storage.getLots({ availableOnly: true });
        const purchases = await this.storage.getPurchases();
        const suppliers = await this.storage.getSuppliers();
        const purchasesById = new Map(purchases.map((p) => [p.id, p]));
        const supplierNames = new Map(suppliers.map((s) => [s.id, s.name]));

        const onHandLots = lots.flatMap((lot) => {
            const purchase = purchasesById.get(lot.purchaseId);
            if (!purchase || !ON_HAND_PURCHASE_STATUSES.includes(purchase.status)) return [];
            return [{ ...lot, batchId: purchase.batchId, supplierName: supplierNames.get(purchase.supplierId) ?? "Unknown" }];
        });
        const inTransit = purchases.filter((p) => IN_TRANSIT_PURCHASE_STATUSES.includes(p.status));
        const totalOnHandLbs = onHandLots.reduce((sum, lot) => sum + lot.remainingWeightLbs, 0);

        return {
            onHandLots,
            inTransit,
            totalOnHandLbs,
            totalInTransitLbs: inTransit.reduce((sum, p) => sum + (p.actualWeightLbs ?? p.statedWeightLbs), 0),
            daysOfSupply: settings.dailyThroughputTarget > 0 ? totalOnHandLbs / settings.dailyThroughputTarget : 0,
        };
    }

    // Supplier and strain views leave rollover runs out
    private async performanceFacts(): Promise<RunFact[]> {
        const settings = await this.settings.getSnapshot();
        const { facts } = await this.loadFacts(await this.storage.getRuns());
        return applyPricingFilter(facts, settings.excludeUnpricedBatches).filter((fact) => !fact.run.isRollover);
    }

    private async loadFacts(runs: Run[]): Promise<LoadedFacts> {
        const inputs = await this.storage.getRunInputsByRunIds(runs.map((run) => run.id));
        const lots = await this.storage.getLotsByIds(Array.from(new Set(inputs.map((input) => input.lotId))));
        const purchases = await this.storage.getPurchasesByIds(Array.from(new Set(lots.map((lot) => lot.purchaseId))));
        const suppliers = await this.storage.getSuppliers();

        const lotsById = new Map(lots.map((lot) => [lot.id, lot]));
        const purchasesById = new Map(purchases.map((p) => [p.id, p]));
        const supplierNames = new Map(suppliers.map((s) => [s.id, s.name]));
        const inputsByRun = new Map<string, RunInput[]>();
        for (const input of inputs) {
            inputsByRun.set(input.runId, [...(inputsByRun.get(input.runId) ?? []), input]);
        }

        const facts = runs.map((run): RunFact => {
            const sources: RunSource[] = [];
            const prices: { pricePerLb: number | null }[] = [];
            for (const input of inputsByRun.get(run.id) ?? []) {
                const lot = lotsById.get(input.lotId);
                const purchase = lot ? purchasesById.get(lot.purchaseId) : undefined;
                if (!lot || !purchase) continue;
                prices.push({ pricePerLb: purchase.pricePerLb });
                sources.push({
                    purchaseId: purchase.id,
                    supplierId: purchase.supplierId,
                    supplierName: supplierNames.get(purchase.supplierId) ?? "Unknown",
                    strainName: lot.strainName,
                });
            }
            return { run, pricingStatus: classifyPricing(prices), sources };
        });

        return { facts, purchasesById };
    }
}
