import type { PipelineStage, PurchaseStatus } from "@shared/schema";

// Pipeline -> purchase direction
const STAGE_TO_STATUS: Record<PipelineStage, PurchaseStatus> = {
  declared: "declared",
  testing: "in_testing",
  committed: "committed",
  delivered: "delivered",
  cancelled: "cancelled",
};

// Purchase -> pipeline direction
const STATUS_TO_STAGE: Record<PurchaseStatus, PipelineStage> = {
  declared: "declared",
  in_testing: "testing",
  available: "testing",
  committed: "committed",
  ordered: "committed",
  in_transit: "committed",
  delivered: "delivered",
  processing: "delivered",
  complete: "delivered",
  cancelled: "cancelled",
};

// Stages at which a pipeline record must have a purchase behind it
export const PURCHASE_CREATING_STAGES: readonly PipelineStage[] = ["committed", "delivered"];

export function stageToPurchaseStatus(stage: PipelineStage): PurchaseStatus {
  return STAGE_TO_STATUS[stage];
}

export function purchaseStatusToStage(status: PurchaseStatus): PipelineStage {
  return STATUS_TO_STAGE[status];
}

export function stageCreatesPurchase(stage: PipelineStage): boolean {
  return PURCHASE_CREATING_STAGES.includes(stage);
}
