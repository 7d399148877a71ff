import { db } from "./db";
import { DbLedgerStorage } from "./Service/Implementations/DbLedgerStorage";
import { createServices } from "./services";

export const storage = new DbLedgerStorage(db);
export const services = createServices(storage);
