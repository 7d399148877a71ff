import { ValidationError } from "../../errors";
import {
    BATCH_ID_MAX_LENGTH,
    effectiveBatchDate,
    ensureUniqueBatchId,
    generateBatchId,
    normalizeBatchId,
} from "../../calculations/batchId";
import type { BatchIdRequest, IBatchIdService } from "../Abstractions/IBatchIdService";
import type { ILedgerStorage } from "../Abstractions/ILedgerStorage";

export class BatchIdService implements IBatchIdService {
    constructor(private readonly now: () => Date = () => new Date()) { }

    async assignBatchId(storage: ILedgerStorage, request: BatchIdRequest): Promise<string> {
        const isTaken = async (batchId: string): Promise<boolean> => {
            const holder = await storage.getPurchaseByBatchId(batchId);
            return holder != null && holder.id !== request.purchaseId;
        };

        const requested = request.requested ? normalizeBatchId(request.requested) : "";
        if (requested) {
            if (requested.length > BATCH_ID_MAX_LENGTH) {
                throw new ValidationError(`Batch ID must be at most ${BATCH_ID_MAX_LENGTH} characters.`, "batchId");
            }
            if (await isTaken(requested)) {
                throw new ValidationError(`Batch ID '${requested}' is already used by another purchase.`, "batchId");
            }
            return requested;
        }

        const candidate = generateBatchId(
            request.supplierName,
            effectiveBatchDate(request.deliveryDate, request.purchaseDate),
            request.weightLbs,
            this.now(),
        );
        return ensureUniqueBatchId(candidate, isTaken);
    }
}
