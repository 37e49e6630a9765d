import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  DATABASE_URL: z.string().trim().min(1).optional(),
  DB_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(0).default(10000),
  LOGO_DIR: z.string().trim().min(1).default("uploads/logos"),
  LOGO_MAX_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  FACTURE_NUMEROTATION: z.enum(["annuelle", "globale"]).default("annuelle"),
  BROUILLON_TTL_MINUTES: z.coerce.number().int().positive().default(120),
  BROUILLON_MAX: z.coerce.number().int().positive().default(1000),
  CLIENT_DELETE_POLICY: z.enum(["detach", "restrict"]).default("detach"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Configuration invalide : ${issues}`);
  }
  return Object.freeze(parsed.data);
}

export const env: Readonly<Env> = loadEnv(process.env);
