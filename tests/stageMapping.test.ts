import { describe, expect, it } from "vitest";

import { PIPELINE_STAGES, PURCHASE_STATUSES } from "@shared/schema";
import {
  purchaseStatusToStage,
  stageCreatesPurchase,
  stageToPurchaseStatus,
} from "../server/calculations/stageMapping";

describe("pipeline stage and purchase status mapping", () => {
  it("maps every stage to a purchase status and back to itself", () => {
    for (const stage of PIPELINE_STAGES) {
      const status = stageToPurchaseStatus(stage);
      expect(PURCHASE_STATUSES).toContain(status);
      expect(purchaseStatusToStage(status)).toBe(stage);
    }
  });

  it("maps every purchase status to a pipeline stage", () => {
    for (const status of PURCHASE_STATUSES) {
      expect(PIPELINE_STAGES).toContain(purchaseStatusToStage(status));
    }
  });

  it("collapses purchase-only statuses onto the nearest stage", () => {
    expect(purchaseStatusToStage("available")).toBe("testing");
    expect(purchaseStatusToStage("ordered")).toBe("committed");
    expect(purchaseStatusToStage("in_transit")).toBe("committed");
    expect(purchaseStatusToStage("processing")).toBe("delivered");
    expect(purchaseStatusToStage("complete")).toBe("delivered");
  });

  it("creates purchases only from committed and delivered", () => {
    expect(PIPELINE_STAGES.filter(stageCreatesPurchase)).toEqual(["committed", "delivered"]);
  });
});
