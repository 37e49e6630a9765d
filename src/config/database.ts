import { Pool } from "pg";
import { env } from "./env";
import logger from "../utils/logger";

const pool = new Pool({
  connectionString: env.DATABASE_URL,
  connectionTimeoutMillis: env.DB_CONNECTION_TIMEOUT_MS,
  statement_timeout: env.DB_STATEMENT_TIMEOUT_MS,
});

pool.on("connect", () => {
  logger.debug("🟢 Connecté à PostgreSQL");
});

pool.on("error", (err) => {
  logger.error("❌ Erreur de connexion PostgreSQL", err);
});

export default pool;
