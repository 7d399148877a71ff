import type { InsertPipelineRecord, PipelineRecord, PipelineStage } from "@shared/schema";
import type { Actor } from "./IAuditService";

export interface IPipelineService {
    getPipelineRecords(filters?: { stage?: PipelineStage }): Promise<PipelineRecord[]>;
    getPipelineRecordById(id: string): Promise<PipelineRecord>;
    createPipelineRecord(input: InsertPipelineRecord, actor: Actor): Promise<PipelineRecord>;
    updatePipelineRecord(id: string, input: InsertPipelineRecord, actor: Actor): Promise<PipelineRecord>;
    deletePipelineRecord(id: string, actor: Actor): Promise<void>;
}
