import type { AuditLog } from "@shared/schema";
import type { AuditEvent, IAuditService } from "../Abstractions/IAuditService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";

export class AuditService implements IAuditService {
    async record(storage: ILedgerStorage, event: AuditEvent): Promise<AuditLog> {
        return storage.createAuditLog({
            userId: event.actor.userId,
            action: event.action,
            entityType: event.entityType,
            entityId: event.entityId,
            details: event.details ?? null,
        });
    }
}
