import { createServer } from "http";
import app from "./config/app";
import { env } from "./config/env";
import { applySchema } from "./config/migrate";
import pool from "./config/database";
import { svcEnsureFournisseur } from "./module/fournisseur/services/fournisseur.service";
import { checkLogoDir } from "./utils/checkLogoDir";
import logger from "./utils/logger";

async function main() {
  await applySchema();
  await svcEnsureFournisseur();

  const logoDir = await checkLogoDir();
  logger.info("📂 Dossier exposé pour les logos :", logoDir);

  const httpServer = createServer(app);

  const shutdown = (signal: string) => {
    logger.info(`${signal} reçu, arrêt du serveur`);
    httpServer.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error("Fermeture du pool PostgreSQL impossible", err);
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  httpServer.listen(env.PORT, () => {
    logger.info(`🚀 API de facturation lancée sur http://localhost:${env.PORT}`);
  });
}

main().catch((err: unknown) => {
  logger.error("🚨 Démarrage impossible", err);
  process.exit(1);
});
