import type { ImportRow } from "@shared/schema";
import type { Actor } from "./IAuditService";

export interface ImportReport {
    imported: number;
    skipped: number;
    errors: number;
}

export interface IImportService {
    importRows(rows: ImportRow[], actor: Actor): Promise<ImportReport>;
}
