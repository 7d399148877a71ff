import type {
    InsertSubmission,
    Purchase,
    PurchaseSubmission,
    ReviewSubmission,
    SubmissionStatus,
} from "@shared/schema";
import type { Actor } from "./IAuditService";

export interface ApprovedSubmission {
    submission: PurchaseSubmission;
    purchase: Purchase;
}

export interface ISubmissionService {
    getSubmissions(filters?: { status?: SubmissionStatus }): Promise<PurchaseSubmission[]>;
    submit(input: InsertSubmission, actor: Actor): Promise<PurchaseSubmission>;
    // Turns a pending submission into a committed purchase with its lots
    approve(id: string, review: ReviewSubmission, actor: Actor): Promise<ApprovedSubmission>;
    reject(id: string, review: ReviewSubmission, actor: Actor): Promise<PurchaseSubmission>;
}
