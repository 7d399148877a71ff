import { sql } from "drizzle-orm";
import { pgTable, text, varchar, integer, timestamp, boolean, jsonb, index, date, doublePrecision } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { isValid, parseISO } from "date-fns";
import { z } from "zod";

// Pipeline stages, in forward order. Backward transitions are allowed.
export const PIPELINE_STAGES = ['declared', 'testing', 'committed', 'delivered', 'cancelled'] as const;
export type PipelineStage = typeof PIPELINE_STAGES[number];

// Purchase statuses span the pipeline-style values plus purchase-only ones
export const PURCHASE_STATUSES = [
  'declared',
  'in_testing',
  'available',
  'committed',
  'ordered',
  'in_transit',
  'delivered',
  'processing',
  'complete',
  'cancelled'
] as const;
export type PurchaseStatus = typeof PURCHASE_STATUSES[number];

// Purchases whose lots are physically in the building
export const ON_HAND_PURCHASE_STATUSES: readonly PurchaseStatus[] = ['delivered', 'in_testing', 'available', 'processing', 'complete'];
export const IN_TRANSIT_PURCHASE_STATUSES: readonly PurchaseStatus[] = ['committed', 'ordered', 'in_transit'];

export const TESTING_TIMINGS = ['before_delivery', 'after_delivery'] as const;
export type TestingTiming = typeof TESTING_TIMINGS[number];

export const TESTING_STATUSES = ['pending', 'completed', 'not_needed'] as const;
export type TestingStatus = typeof TESTING_STATUSES[number];

export const RUN_TYPES = ['standard', 'kief', 'ld'] as const;
export type RunType = typeof RUN_TYPES[number];

export const COST_TYPES = ['solvent', 'personnel', 'overhead'] as const;
export type CostType = typeof COST_TYPES[number];

export const COST_ALLOCATION_METHODS = ['per_gram_uniform', 'split_50_50', 'custom_split'] as const;
export type CostAllocationMethod = typeof COST_ALLOCATION_METHODS[number];

// Field submissions wait for review; approval turns them into a committed purchase
export const SUBMISSION_STATUSES = ['pending', 'approved', 'rejected'] as const;
export type SubmissionStatus = typeof SUBMISSION_STATUSES[number];

export type KpiDirection = 'higher_is_better' | 'lower_is_better';

export type AuditAction = 'create' | 'update' | 'delete' | 'approve' | 'reject';

// Suppliers - growers and brokers we buy biomass from (deactivation is soft)
export const suppliers = pgTable("suppliers", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 200 }).notNull(),
  contactName: varchar("contact_name", { length: 200 }),
  contactPhone: varchar("contact_phone", { length: 50 }),
  contactEmail: varchar("contact_email", { length: 200 }),
  location: varchar("location", { length: 200 }),
  notes: text("notes"),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

// Purchases - one row per biomass batch bought from a supplier
export const purchases = pgTable("purchases", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  supplierId: varchar("supplier_id").notNull().references(() => suppliers.id),
  purchaseDate: date("purchase_date").notNull(),
  deliveryDate: date("delivery_date"),
  status: varchar("status", { length: 20 }).$type<PurchaseStatus>().notNull().default("ordered"),
  statedWeightLbs: doublePrecision("stated_weight_lbs").notNull(),
  actualWeightLbs: doublePrecision("actual_weight_lbs"),
  statedPotencyPct: doublePrecision("stated_potency_pct"),
  testedPotencyPct: doublePrecision("tested_potency_pct"),
  pricePerLb: doublePrecision("price_per_lb"),
  totalCost: doublePrecision("total_cost"),
  trueUpAmount: doublePrecision("true_up_amount"),
  trueUpStatus: varchar("true_up_status", { length: 20 }),
  harvestDate: date("harvest_date"),
  cleanOrDirty: varchar("clean_or_dirty", { length: 10 }),
  indoorOutdoor: varchar("indoor_outdoor", { length: 20 }),
  batchId: varchar("batch_id", { length: 80 }).notNull().unique(),
  notes: text("notes"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => [index("IDX_purchases_supplier").on(table.supplierId)]);

// Biomass pipeline - pre-purchase availability tracking (declared -> delivered)
export const biomassPipeline = pgTable("biomass_pipeline", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  supplierId: varchar("supplier_id").notNull().references(() => suppliers.id),
  availabilityDate: date("availability_date").notNull(),
  strainName: varchar("strain_name", { length: 200 }),
  stage: varchar("stage", { length: 20 }).$type<PipelineStage>().notNull().default("declared"),
  declaredWeightLbs: doublePrecision("declared_weight_lbs").notNull().default(0),
  declaredPricePerLb: doublePrecision("declared_price_per_lb"),
  estimatedPotencyPct: doublePrecision("estimated_potency_pct"),
  testingTiming: varchar("testing_timing", { length: 20 }).$type<TestingTiming>().notNull().default("before_delivery"),
  testingStatus: varchar("testing_status", { length: 20 }).$type<TestingStatus>().notNull().default("pending"),
  testingDate: date("testing_date"),
  testedPotencyPct: doublePrecision("tested_potency_pct"),
  committedOn: date("committed_on"),
  committedDeliveryDate: date("committed_delivery_date"),
  committedWeightLbs: doublePrecision("committed_weight_lbs"),
  committedPricePerLb: doublePrecision("committed_price_per_lb"),
  // Set once the record has produced a purchase; one-to-one
  purchaseId: varchar("purchase_id").unique().references(() => purchases.id),
  notes: text("notes"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => [index("IDX_biomass_pipeline_stage").on(table.stage)]);

// Purchase lots - strain-level inventory inside a purchase
export const purchaseLots = pgTable("purchase_lots", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  purchaseId: varchar("purchase_id").notNull().references(() => purchases.id, { onDelete: "cascade" }),
  strainName: varchar("strain_name", { length: 200 }).notNull(),
  weightLbs: doublePrecision("weight_lbs").notNull(),
  remainingWeightLbs: doublePrecision("remaining_weight_lbs").notNull(),
  potencyPct: doublePrecision("potency_pct"),
  microPotTest: varchar("micro_pot_test", { length: 100 }),
  milled: boolean("milled").notNull().default(false),
  location: varchar("location", { length: 200 }),
  notes: text("notes"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => [index("IDX_purchase_lots_purchase").on(table.purchaseId)]);

// Extraction runs. Yield and cost columns are derived on every save.
export const runs = pgTable("runs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  runDate: date("run_date").notNull(),
  reactorNumber: integer("reactor_number").notNull(),
  runType: varchar("run_type", { length: 20 }).$type<RunType>().notNull().default("standard"),
  isRollover: boolean("is_rollover").notNull().default(false),
  bioInHouseLbs: doublePrecision("bio_in_house_lbs"),
  bioInReactorLbs: doublePrecision("bio_in_reactor_lbs"),
  butaneInHouseLbs: doublePrecision("butane_in_house_lbs"),
  solventRatio: doublePrecision("solvent_ratio"),
  systemTemp: doublePrecision("system_temp"),
  fuelConsumption: doublePrecision("fuel_consumption"),
  decarbSampleDone: boolean("decarb_sample_done").notNull().default(false),
  wetHteG: doublePrecision("wet_hte_g"),
  wetThcaG: doublePrecision("wet_thca_g"),
  dryHteG: doublePrecision("dry_hte_g"),
  dryThcaG: doublePrecision("dry_thca_g"),
  // Derived: yields
  gramsRan: doublePrecision("grams_ran"),
  overallYieldPct: doublePrecision("overall_yield_pct"),
  thcaYieldPct: doublePrecision("thca_yield_pct"),
  hteYieldPct: doublePrecision("hte_yield_pct"),
  // Derived: costs
  biomassCost: doublePrecision("biomass_cost"),
  opCostPerGram: doublePrecision("op_cost_per_gram"),
  totalCost: doublePrecision("total_cost"),
  costPerGramCombined: doublePrecision("cost_per_gram_combined"),
  costPerGramThca: doublePrecision("cost_per_gram_thca"),
  costPerGramHte: doublePrecision("cost_per_gram_hte"),
  notes: text("notes"),
  // date|strain|source of the sheet row a run was imported from
  importKey: varchar("import_key", { length: 500 }),
  createdBy: varchar("created_by"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => [
  index("IDX_runs_run_date").on(table.runDate),
  index("IDX_runs_import_key").on(table.importKey),
]);

// Run inputs - how much of which lot a run consumed
export const runInputs = pgTable("run_inputs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  runId: varchar("run_id").notNull().references(() => runs.id, { onDelete: "cascade" }),
  lotId: varchar("lot_id").notNull().references(() => purchaseLots.id),
  weightLbs: doublePrecision("weight_lbs").notNull(),
}, (table) => [
  index("IDX_run_inputs_run").on(table.runId),
  index("IDX_run_inputs_lot").on(table.lotId),
]);

// Operational cost entries, allocated to runs by date-window overlap
export const costEntries = pgTable("cost_entries", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  costType: varchar("cost_type", { length: 20 }).$type<CostType>().notNull(),
  name: varchar("name", { length: 200 }).notNull(),
  startDate: date("start_date").notNull(),
  endDate: date("end_date").notNull(),
  totalCost: doublePrecision("total_cost").notNull(),
  unitCost: doublePrecision("unit_cost"),
  quantity: doublePrecision("quantity"),
  unit: varchar("unit", { length: 50 }),
  notes: text("notes"),
  createdBy: varchar("created_by"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => [index("IDX_cost_entries_window").on(table.startDate, table.endDate)]);

// Key-value system settings (typed by SettingsService)
export const systemSettings = pgTable("system_settings", {
  key: varchar("key", { length: 100 }).primaryKey(),
  value: varchar("value", { length: 500 }).notNull(),
  description: varchar("description", { length: 500 }),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

// KPI targets for dashboard color coding
export const kpiTargets = pgTable("kpi_targets", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  kpiName: varchar("kpi_name", { length: 100 }).notNull().unique(),
  displayName: varchar("display_name", { length: 200 }).notNull(),
  targetValue: doublePrecision("target_value").notNull(),
  greenThreshold: doublePrecision("green_threshold").notNull(),
  yellowThreshold: doublePrecision("yellow_threshold").notNull(),
  direction: varchar("direction", { length: 20 }).$type<KpiDirection>().notNull(),
  unit: varchar("unit", { length: 20 }),
  effectiveDate: date("effective_date"),
  updatedBy: varchar("updated_by"),
});

export interface SubmissionLot {
  strainName: string;
  weightLbs: number;
}

// Potential purchases sent in from the field, pending admin review
export const purchaseSubmissions = pgTable("purchase_submissions", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  supplierId: varchar("supplier_id").notNull().references(() => suppliers.id),
  purchaseDate: date("purchase_date").notNull(),
  deliveryDate: date("delivery_date"),
  estimatedPotencyPct: doublePrecision("estimated_potency_pct"),
  pricePerLb: doublePrecision("price_per_lb"),
  notes: text("notes"),
  lots: jsonb("lots").$type<SubmissionLot[]>().notNull(),
  status: varchar("status", { length: 20 }).$type<SubmissionStatus>().notNull().default("pending"),
  submittedBy: varchar("submitted_by"),
  submittedAt: timestamp("submitted_at").notNull().defaultNow(),
  reviewedBy: varchar("reviewed_by"),
  reviewedAt: timestamp("reviewed_at"),
  reviewNotes: text("review_notes"),
  approvedPurchaseId: varchar("approved_purchase_id").references(() => purchases.id),
}, (table) => [index("IDX_purchase_submissions_status").on(table.status)]);

// Audit log - write-only from the core's point of view
export const auditLogs = pgTable("audit_logs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  timestamp: timestamp("timestamp").notNull().defaultNow(),
  userId: varchar("user_id"),
  action: varchar("action", { length: 20 }).$type<AuditAction>().notNull(),
  entityType: varchar("entity_type", { length: 50 }).notNull(),
  entityId: varchar("entity_id", { length: 36 }).notNull(),
  details: jsonb("details").$type<Record<string, unknown>>(),
}, (table) => [index("IDX_audit_logs_entity").on(table.entityType, table.entityId)]);

// Shared field validators
export const isoDateSchema = z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date")
  .refine((val) => isValid(parseISO(val)), "Invalid date");
const optionalIsoDate = isoDateSchema.nullable().optional();
const optionalNonNegative = z.number().min(0).nullable().optional();
const optionalPercent = z.number().min(0).max(100).nullable().optional();
const optionalText = (max: number) => z.string().trim().max(max).nullable().optional()
  .transform((val) => val ? val : null);

// Insert schemas
const supplierFullSchema = createInsertSchema(suppliers, {
  name: z.string().trim().min(1, "Supplier name is required").max(200),
  contactName: optionalText(200),
  contactPhone: optionalText(50),
  contactEmail: z.string().trim().email().nullable().optional().or(z.literal("").transform(() => null)),
  location: optionalText(200),
  notes: optionalText(10000),
});
export const insertSupplierSchema = supplierFullSchema.omit({
  id: true,
  createdAt: true,
});

const pipelineFullSchema = createInsertSchema(biomassPipeline, {
  supplierId: z.string().min(1, "Supplier is required"),
  availabilityDate: isoDateSchema,
  strainName: optionalText(200),
  stage: z.enum(PIPELINE_STAGES).default("declared"),
  declaredWeightLbs: z.number().min(0, "Declared weight cannot be negative").default(0),
  declaredPricePerLb: optionalNonNegative,
  estimatedPotencyPct: optionalPercent,
  testingTiming: z.enum(TESTING_TIMINGS).default("before_delivery"),
  testingStatus: z.enum(TESTING_STATUSES).default("pending"),
  testingDate: optionalIsoDate,
  testedPotencyPct: optionalPercent,
  committedOn: optionalIsoDate,
  committedDeliveryDate: optionalIsoDate,
  committedWeightLbs: optionalNonNegative,
  committedPricePerLb: optionalNonNegative,
  notes: optionalText(10000),
});
export const insertPipelineRecordSchema = pipelineFullSchema.omit({
  id: true,
  purchaseId: true,
  createdAt: true,
  updatedAt: true,
});

const lotFullSchema = createInsertSchema(purchaseLots, {
  strainName: z.string().trim().min(1, "Strain is required").max(200),
  weightLbs: z.number().positive("Lot weight must be positive"),
  potencyPct: optionalPercent,
  microPotTest: optionalText(100),
  milled: z.boolean().default(false),
  location: optionalText(200),
  notes: optionalText(10000),
});
export const insertLotSchema = lotFullSchema.omit({
  id: true,
  purchaseId: true,
  remainingWeightLbs: true,
  createdAt: true,
});

const purchaseFullSchema = createInsertSchema(purchases, {
  supplierId: z.string().min(1, "Supplier is required"),
  purchaseDate: isoDateSchema,
  deliveryDate: optionalIsoDate,
  status: z.enum(PURCHASE_STATUSES).default("ordered"),
  statedWeightLbs: z.number().min(0, "Stated weight cannot be negative"),
  actualWeightLbs: optionalNonNegative,
  statedPotencyPct: optionalPercent,
  testedPotencyPct: optionalPercent,
  pricePerLb: optionalNonNegative,
  trueUpStatus: optionalText(20),
  harvestDate: optionalIsoDate,
  cleanOrDirty: optionalText(10),
  indoorOutdoor: optionalText(20),
  batchId: z.string().trim().max(80, "Batch ID must be at most 80 characters").optional(),
  notes: optionalText(10000),
});
export const insertPurchaseSchema = purchaseFullSchema.omit({
  id: true,
  totalCost: true,
  trueUpAmount: true,
  createdAt: true,
  updatedAt: true,
}).extend({
  // Lots are only created along with a new purchase
  lots: z.array(insertLotSchema).optional(),
});

export const runInputDraftSchema = z.object({
  lotId: z.string().min(1, "Lot is required"),
  weightLbs: z.number(),
});

const runFullSchema = createInsertSchema(runs, {
  runDate: isoDateSchema,
  reactorNumber: z.number().int().positive("Reactor number must be positive"),
  runType: z.enum(RUN_TYPES).default("standard"),
  isRollover: z.boolean().default(false),
  bioInHouseLbs: optionalNonNegative,
  bioInReactorLbs: optionalNonNegative,
  butaneInHouseLbs: optionalNonNegative,
  solventRatio: optionalNonNegative,
  systemTemp: z.number().nullable().optional(),
  fuelConsumption: optionalNonNegative,
  decarbSampleDone: z.boolean().default(false),
  wetHteG: optionalNonNegative,
  wetThcaG: optionalNonNegative,
  dryHteG: optionalNonNegative,
  dryThcaG: optionalNonNegative,
  notes: optionalText(10000),
});
export const insertRunSchema = runFullSchema.pick({
  runDate: true,
  reactorNumber: true,
  runType: true,
  isRollover: true,
  bioInHouseLbs: true,
  bioInReactorLbs: true,
  butaneInHouseLbs: true,
  solventRatio: true,
  systemTemp: true,
  fuelConsumption: true,
  decarbSampleDone: true,
  wetHteG: true,
  wetThcaG: true,
  dryHteG: true,
  dryThcaG: true,
  notes: true,
}).extend({
  inputs: z.array(runInputDraftSchema).default([]),
});

const costEntryFullSchema = createInsertSchema(costEntries, {
  costType: z.enum(COST_TYPES),
  name: z.string().trim().min(1, "Name is required").max(200),
  startDate: isoDateSchema,
  endDate: isoDateSchema,
  totalCost: z.number().min(0, "Total cost cannot be negative"),
  unitCost: optionalNonNegative,
  quantity: optionalNonNegative,
  unit: optionalText(50),
  notes: optionalText(10000),
});
export const insertCostEntrySchema = costEntryFullSchema.omit({
  id: true,
  createdBy: true,
  createdAt: true,
}).refine((entry) => entry.endDate >= entry.startDate, {
  message: "End date must be on or after start date",
  path: ["endDate"],
});

const submissionLotSchema = z.object({
  strainName: z.string().trim().min(1, "Lot strain name is required.").max(200),
  weightLbs: z.number().positive("Lot weight must be greater than 0."),
});

const submissionFullSchema = createInsertSchema(purchaseSubmissions, {
  supplierId: z.string().min(1, "Supplier is required."),
  purchaseDate: isoDateSchema,
  deliveryDate: optionalIsoDate,
  estimatedPotencyPct: optionalPercent,
  pricePerLb: optionalNonNegative,
  notes: optionalText(10000),
  lots: z.array(submissionLotSchema).min(1, "Add at least one lot/strain with weight."),
});
export const insertSubmissionSchema = submissionFullSchema.pick({
  supplierId: true,
  purchaseDate: true,
  deliveryDate: true,
  estimatedPotencyPct: true,
  pricePerLb: true,
  notes: true,
  lots: true,
});

export const reviewSubmissionSchema = z.object({
  reviewNotes: optionalText(10000),
});

// Settings updates arrive as loose strings/numbers/booleans from the settings form
export const updateSettingsSchema = z.object({
  potencyRate: z.number().min(0).optional(),
  numReactors: z.number().int().min(0).optional(),
  reactorCapacity: z.number().min(0).optional(),
  runsPerDay: z.number().min(0).optional(),
  operatingDays: z.number().min(0).max(7).optional(),
  dailyThroughputTarget: z.number().min(0).optional(),
  weeklyThroughputTarget: z.number().min(0).optional(),
  excludeUnpricedBatches: z.boolean().optional(),
  costAllocationMethod: z.string().optional(),
  costAllocationThcaPct: z.number().optional(),
});

// Normalized import rows (CSV parsing happens upstream)
export const importRowSchema = z.object({
  runDate: z.string().nullable().optional(),
  source: z.string().trim().default(""),
  strain: z.string().trim().default(""),
  lbsRan: z.number().nullable().optional(),
  gramsRan: z.number().nullable().optional(),
  bioInHouseLbs: z.number().nullable().optional(),
  butaneInHouseLbs: z.number().nullable().optional(),
  solventRatio: z.number().nullable().optional(),
  wetHteG: z.number().nullable().optional(),
  wetThcaG: z.number().nullable().optional(),
  dryHteG: z.number().nullable().optional(),
  dryThcaG: z.number().nullable().optional(),
  pricePerLb: z.number().nullable().optional(),
});

// Types
export type InsertSupplier = z.infer<typeof insertSupplierSchema>;
export type Supplier = typeof suppliers.$inferSelect;
export type NewSupplier = typeof suppliers.$inferInsert;

export type InsertPipelineRecord = z.infer<typeof insertPipelineRecordSchema>;
export type PipelineRecord = typeof biomassPipeline.$inferSelect;
export type NewPipelineRecord = typeof biomassPipeline.$inferInsert;

export type InsertPurchase = z.infer<typeof insertPurchaseSchema>;
export type Purchase = typeof purchases.$inferSelect;
export type NewPurchase = typeof purchases.$inferInsert;

export type InsertLot = z.infer<typeof insertLotSchema>;
export type Lot = typeof purchaseLots.$inferSelect;
export type NewLot = typeof purchaseLots.$inferInsert;

export type InsertRun = z.infer<typeof insertRunSchema>;
export type RunInputDraft = z.infer<typeof runInputDraftSchema>;
export type Run = typeof runs.$inferSelect;
export type NewRun = typeof runs.$inferInsert;

export type RunInput = typeof runInputs.$inferSelect;
export type NewRunInput = typeof runInputs.$inferInsert;

export type InsertCostEntry = z.infer<typeof insertCostEntrySchema>;
export type CostEntry = typeof costEntries.$inferSelect;
export type NewCostEntry = typeof costEntries.$inferInsert;

export type InsertSubmission = z.infer<typeof insertSubmissionSchema>;
export type ReviewSubmission = z.infer<typeof reviewSubmissionSchema>;
export type PurchaseSubmission = typeof purchaseSubmissions.$inferSelect;
export type NewPurchaseSubmission = typeof purchaseSubmissions.$inferInsert;

export type UpdateSettings = z.infer<typeof updateSettingsSchema>;
export type SystemSetting = typeof systemSettings.$inferSelect;

export type KpiTarget = typeof kpiTargets.$inferSelect;
export type NewKpiTarget = typeof kpiTargets.$inferInsert;

export type AuditLog = typeof auditLogs.$inferSelect;
export type NewAuditLog = typeof auditLogs.$inferInsert;

export type ImportRow = z.infer<typeof importRowSchema>;
