import mongoose from "mongoose";

import { connectMongo, closeMongo } from "../src/config/db.js";
import { logger } from "../src/config/logger.js";
import { AuditLog } from "../src/modules/audit/model.js";
import { Brand } from "../src/modules/brands/model.js";
import { CarModel } from "../src/modules/carmodels/model.js";
import { Car } from "../src/modules/cars/model.js";
import { Rental } from "../src/modules/rentals/model.js";
import { User } from "../src/modules/users/model.js";

// unique indexes (plate, email, phone, licence pair, passport pair, brand name) are declared on the schemas
const MODELS = [User, Brand, CarModel, Car, Rental, AuditLog];

async function main() {
  await connectMongo();

  // 1) Sync model indexes (creates collections if needed)
  for (const m of MODELS) {
    const dropped = await m.syncIndexes();
    logger.info("indexes.synced", { model: m.modelName, dropped });
  }

  // 2) Print what the server now has
  const db = mongoose.connection.db;
  if (!db) throw new Error("Mongo connection not ready");
  for (const m of MODELS) {
    const name = m.collection.collectionName;
    const exists = await db.listCollections({ name }).hasNext();
    if (!exists) {
      logger.info("indexes.listed", { collection: name, indexes: [] });
      continue;
    }
    const idx = await db.collection(name).indexes();
    logger.info("indexes.listed", { collection: name, indexes: idx.map((i) => i.name) });
  }

  await closeMongo();
}

main().catch((err: unknown) => {
  logger.error("indexes.sync_failed", { message: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
