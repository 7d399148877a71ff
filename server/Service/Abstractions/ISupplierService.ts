import type { InsertSupplier, Supplier } from "@shared/schema";
import type { Actor } from "./IAuditService";

export interface ISupplierService {
    getSuppliers(filters?: { activeOnly?: boolean }): Promise<Supplier[]>;
    getSupplierById(id: string): Promise<Supplier>;
    createSupplier(input: InsertSupplier, actor: Actor): Promise<Supplier>;
    updateSupplier(id: string, input: Partial<InsertSupplier>, actor: Actor): Promise<Supplier>;
    setSupplierActive(id: string, isActive: boolean, actor: Actor): Promise<Supplier>;
}
