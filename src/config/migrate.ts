import fs from "node:fs/promises";
import path from "node:path";
import pool from "./database";
import logger from "../utils/logger";

export const SCHEMA_PATH = path.resolve("db/schema.sql");

/** Applique db/schema.sql (idempotent : CREATE ... IF NOT EXISTS). */
export async function applySchema(schemaPath = SCHEMA_PATH): Promise<void> {
  const sql = await fs.readFile(schemaPath, "utf8");
  await pool.query(sql);
  logger.info(`🗄️  Schéma appliqué (${path.basename(schemaPath)})`);
}
