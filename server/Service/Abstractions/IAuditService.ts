import type { AuditAction, AuditLog } from "@shared/schema";
import type { ILedgerStorage } from "./ILedgerStorage";

export interface Actor {
    userId: string | null;
}

export interface AuditEvent {
    action: AuditAction;
    entityType: string;
    entityId: string;
    actor: Actor;
    details?: Record<string, unknown>;
}

export interface IAuditService {
    // Persisted through the given storage so the event shares the caller's transaction
    record(storage: ILedgerStorage, event: AuditEvent): Promise<AuditLog>;
}
