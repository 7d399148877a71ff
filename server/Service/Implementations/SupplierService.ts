import type { InsertSupplier, Supplier } from "@shared/schema";
import { NotFoundError, ValidationError } from "../../errors";
import type { Actor, IAuditService } from "../Abstractions/IAuditService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";
import type { ISupplierService } from "../Abstractions/ISupplierService";

export class SupplierService implements ISupplierService {
    constructor(
        private readonly storage: ILedgerStorage,
        private readonly audit: IAuditService,
    ) { }

    async getSuppliers(filters?: { activeOnly?: boolean }): Promise<Supplier[]> {
        return this.storage.getSuppliers(filters);
    }

    async getSupplierById(id: string): Promise<Supplier> {
        const supplier = await this.storage.getSupplierById(id);
        if (!supplier) {
            throw new NotFoundError("Supplier", id);
        }
        return supplier;
    }

    async createSupplier(input: InsertSupplier, actor: Actor): Promise<Supplier> {
        return this.storage.transaction(async (tx) => {
            if (await tx.getSupplierByName(input.name)) {
                throw new ValidationError(`A supplier named '${input.name}' already exists.`, "name");
            }
            const supplier = await tx.createSupplier(input);
            await this.audit.record(tx, {
                action: "create",
                entityType: "supplier",
                entityId: supplier.id,
                actor,
                details: { name: supplier.name },
            });
            return supplier;
        });
    }

    async updateSupplier(id: string, input: Partial<InsertSupplier>, actor: Actor): Promise<Supplier> {
        return this.storage.transaction(async (tx) => {
            if (input.name) {
                const clash = await tx.getSupplierByName(input.name);
                if (clash && clash.id !== id) {
                    throw new ValidationError(`A supplier named '${input.name}' already exists.`, "name");
                }
            }
            const supplier = await tx.updateSupplier(id, input);
            if (!supplier) {
                throw new NotFoundError("Supplier", id);
            }
            await this.audit.record(tx, {
                action: "update",
                entityType: "supplier",
                entityId: id,
                actor,
                details: { fields: Object.keys(input) },
            });
            return supplier;
        });
    }

    async setSupplierActive(id: string, isActive: boolean, actor: Actor): Promise<Supplier> {
        return this.updateSupplier(id, { isActive }, actor);
    }
}
