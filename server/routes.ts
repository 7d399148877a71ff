import type { Express, NextFunction, Request, Response } from "express";
import { z } from "zod";
import {
  COST_TYPES,
  PIPELINE_STAGES,
  PURCHASE_STATUSES,
  SUBMISSION_STATUSES,
  importRowSchema,
  insertCostEntrySchema,
  insertLotSchema,
  insertPipelineRecordSchema,
  insertPurchaseSchema,
  insertRunSchema,
  insertSubmissionSchema,
  insertSupplierSchema,
  isoDateSchema,
  reviewSubmissionSchema,
  updateSettingsSchema,
} from "@shared/schema";
import type { Actor } from "./Service/Abstractions/IAuditService";
import { DASHBOARD_PERIODS } from "./Service/Abstractions/IAnalyticsService";
import type { LedgerServices } from "./services";
import { toErrorResponse } from "./httpErrors";

// Set by the authentication layer in front of this API
declare global {
  namespace Express {
    interface Request {
      user?: {
        username?: string;
        id?: string;
      };
    }
  }
}

type Handler = (req: Request, res: Response) => Promise<unknown>;

function route(handler: Handler) {
  return async (req: Request, res: Response, _next: NextFunction) => {
    try {
      await handler(req, res);
    } catch (error) {
      const { status, body } = toErrorResponse(error);
      res.status(status).json(body);
    }
  };
}

function actorOf(req: Request): Actor {
  return { userId: req.user?.id ?? null };
}

const runRangeQuery = z.object({
  startDate: isoDateSchema.optional(),
  endDate: isoDateSchema.optional(),
});
const supplierListQuery = z.object({ active: z.enum(["true", "false"]).optional() });
const pipelineListQuery = z.object({ stage: z.enum(PIPELINE_STAGES).optional() });
const purchaseListQuery = z.object({
  status: z.enum(PURCHASE_STATUSES).optional(),
  supplierId: z.string().optional(),
});
const submissionListQuery = z.object({ status: z.enum(SUBMISSION_STATUSES).optional() });
const costEntryListQuery = z.object({ costType: z.enum(COST_TYPES).optional() });
const dashboardQuery = z.object({ period: z.enum(DASHBOARD_PERIODS).default("30") });
const strainQuery = z.object({ view: z.enum(["all", "90"]).default("all") });
const supplierActiveBody = z.object({ isActive: z.boolean() });
const importBody = z.object({ rows: z.array(importRowSchema) });

export function registerRoutes(app: Express, services: LedgerServices) {
  // Suppliers
  app.get("/api/suppliers", route(async (req, res) => {
    const { active } = supplierListQuery.parse(req.query);
    res.json(await services.suppliers.getSuppliers({ activeOnly: active === "true" }));
  }));

  app.post("/api/suppliers", route(async (req, res) => {
    const validated = insertSupplierSchema.parse(req.body);
    res.status(201).json(await services.suppliers.createSupplier(validated, actorOf(req)));
  }));

  app.patch("/api/suppliers/:id", route(async (req, res) => {
    const validated = insertSupplierSchema.partial().parse(req.body);
    res.json(await services.suppliers.updateSupplier(req.params.id, validated, actorOf(req)));
  }));

  app.post("/api/suppliers/:id/active", route(async (req, res) => {
    const { isActive } = supplierActiveBody.parse(req.body);
    res.json(await services.suppliers.setSupplierActive(req.params.id, isActive, actorOf(req)));
  }));

  // Biomass pipeline
  app.get("/api/pipeline", route(async (req, res) => {
    res.json(await services.pipeline.getPipelineRecords(pipelineListQuery.parse(req.query)));
  }));

  app.get("/api/pipeline/:id", route(async (req, res) => {
    res.json(await services.pipeline.getPipelineRecordById(req.params.id));
  }));

  app.post("/api/pipeline", route(async (req, res) => {
    const validated = insertPipelineRecordSchema.parse(req.body);
    res.status(201).json(await services.pipeline.createPipelineRecord(validated, actorOf(req)));
  }));

  app.put("/api/pipeline/:id", route(async (req, res) => {
    const validated = insertPipelineRecordSchema.parse(req.body);
    res.json(await services.pipeline.updatePipelineRecord(req.params.id, validated, actorOf(req)));
  }));

  app.delete("/api/pipeline/:id", route(async (req, res) => {
    await services.pipeline.deletePipelineRecord(req.params.id, actorOf(req));
    res.status(204).end();
  }));

  // Purchases and lots
  app.get("/api/purchases", route(async (req, res) => {
    res.json(await services.purchases.getPurchases(purchaseListQuery.parse(req.query)));
  }));

  app.get("/api/purchases/:id", route(async (req, res) => {
    res.json(await services.purchases.getPurchaseDetail(req.params.id));
  }));

  app.post("/api/purchases", route(async (req, res) => {
    const validated = insertPurchaseSchema.parse(req.body);
    res.status(201).json(await services.purchases.createPurchase(validated, actorOf(req)));
  }));

  app.put("/api/purchases/:id", route(async (req, res) => {
    const validated = insertPurchaseSchema.parse(req.body);
    res.json(await services.purchases.updatePurchase(req.params.id, validated, actorOf(req)));
  }));

  app.post("/api/purchases/:id/lots", route(async (req, res) => {
    const validated = insertLotSchema.parse(req.body);
    res.status(201).json(await services.purchases.addLot(req.params.id, validated, actorOf(req)));
  }));

  app.get("/api/lots/available", route(async (_req, res) => {
    res.json(await services.purchases.getAvailableLots());
  }));

  // Field purchase submissions
  app.get("/api/submissions", route(async (req, res) => {
    res.json(await services.submissions.getSubmissions(submissionListQuery.parse(req.query)));
  }));

  app.post("/api/submissions", route(async (req, res) => {
    const validated = insertSubmissionSchema.parse(req.body);
    res.status(201).json(await services.submissions.submit(validated, actorOf(req)));
  }));

  app.post("/api/submissions/:id/approve", route(async (req, res) => {
    const validated = reviewSubmissionSchema.parse(req.body ?? {});
    res.json(await services.submissions.approve(req.params.id, validated, actorOf(req)));
  }));

  app.post("/api/submissions/:id/reject", route(async (req, res) => {
    const validated = reviewSubmissionSchema.parse(req.body ?? {});
    res.json(await services.submissions.reject(req.params.id, validated, actorOf(req)));
  }));

  // Runs
  app.get("/api/runs", route(async (req, res) => {
    res.json(await services.runs.getRuns(runRangeQuery.parse(req.query)));
  }));

  app.get("/api/runs/:id", route(async (req, res) => {
    res.json(await services.runs.getRunDetail(req.params.id));
  }));

  app.post("/api/runs", route(async (req, res) => {
    const validated = insertRunSchema.parse(req.body);
    res.status(201).json(await services.runs.createRun(validated, actorOf(req)));
  }));

  app.put("/api/runs/:id", route(async (req, res) => {
    const validated = insertRunSchema.parse(req.body);
    res.json(await services.runs.updateRun(req.params.id, validated, actorOf(req)));
  }));

  app.delete("/api/runs/:id", route(async (req, res) => {
    await services.runs.deleteRun(req.params.id, actorOf(req));
    res.status(204).end();
  }));

  // Operational cost entries
  app.get("/api/cost-entries", route(async (req, res) => {
    res.json(await services.costEntries.getCostEntries(costEntryListQuery.parse(req.query)));
  }));

  app.post("/api/cost-entries", route(async (req, res) => {
    const validated = insertCostEntrySchema.parse(req.body);
    res.status(201).json(await services.costEntries.createCostEntry(validated, actorOf(req)));
  }));

  app.put("/api/cost-entries/:id", route(async (req, res) => {
    const validated = insertCostEntrySchema.parse(req.body);
    res.json(await services.costEntries.updateCostEntry(req.params.id, validated, actorOf(req)));
  }));

  app.delete("/api/cost-entries/:id", route(async (req, res) => {
    await services.costEntries.deleteCostEntry(req.params.id, actorOf(req));
    res.status(204).end();
  }));

  // Settings
  app.get("/api/settings", route(async (_req, res) => {
    res.json({
      settings: await services.settings.getSnapshot(),
      kpiTargets: await services.settings.getKpiTargets(),
    });
  }));

  app.put("/api/settings", route(async (req, res) => {
    res.json(await services.settings.updateSettings(updateSettingsSchema.parse(req.body)));
  }));

  app.post("/api/settings/recalculate", route(async (req, res) => {
    res.json(await services.recalculation.recalculateAll(actorOf(req)));
  }));

  // Analytics
  app.get("/api/analytics/dashboard", route(async (req, res) => {
    const { period } = dashboardQuery.parse(req.query);
    res.json(await services.analytics.getDashboard(period));
  }));

  app.get("/api/analytics/suppliers", route(async (_req, res) => {
    res.json(await services.analytics.getSupplierPerformance());
  }));

  app.get("/api/analytics/strains", route(async (req, res) => {
    const { view } = strainQuery.parse(req.query);
    res.json(await services.analytics.getStrainPerformance(view === "90" ? { days: 90 } : {}));
  }));

  app.get("/api/analytics/inventory", route(async (_req, res) => {
    res.json(await services.analytics.getInventorySummary());
  }));

  // Import of normalized run rows
  app.post("/api/import/runs", route(async (req, res) => {
    const { rows } = importBody.parse(req.body);
    res.json(await services.imports.importRows(rows, actorOf(req)));
  }));
}
