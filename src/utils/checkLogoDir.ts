import fs from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env";
import logger from "./logger";

/**
 * Vérifie que le dossier des logos existe et est accessible en écriture
 * (création si absent).
 */
export const checkLogoDir = async (dir = env.LOGO_DIR): Promise<string> => {
  const basePath = path.resolve(dir);
  logger.debug(`🔍 Vérification du dossier des logos : ${basePath}`);

  await fs.mkdir(basePath, { recursive: true });
  await fs.access(basePath, fs.constants.W_OK);

  logger.debug("✅ Le dossier des logos est accessible");
  return basePath;
};
