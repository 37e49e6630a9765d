import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { env } from "../../config/env";
import { fileTimestamp } from "../../utils/dates";
import { HttpError } from "../../utils/httpError";
import { logoExtension } from "./logo-types";

export const LOGO_PUBLIC_PREFIX = "logos";

export type LogoStore = {
  /** Écrit les octets et renvoie la référence publique (ex. "logos/client_20260314_091502_ab12cd.png"). */
  store(bytes: Buffer, mimetype: string, prefix?: string): Promise<string>;
  /** Chemin disque d'une référence produite par store(), null si elle ne vient pas de ce dossier. */
  resolve(ref: string | null | undefined): string | null;
};

/**
 * Génère un nom de fichier du type :
 *   PREFIX_YYYYMMDD_HHMMSS_RAND.ext
 * L'extension vient du type MIME, jamais du nom envoyé par le client.
 */
export function buildLogoFilename(prefix: string, mimetype: string, now: Date): string {
  const ext = logoExtension(mimetype);
  if (!ext) {
    throw new HttpError(400, "VALIDATION_ERROR", "Seules les images PNG, JPEG, GIF ou WebP sont autorisées");
  }
  const safePrefix = prefix.replace(/[^a-zA-Z0-9-]/g, "") || "logo";
  const rand = crypto.randomBytes(3).toString("hex");
  return `${safePrefix}_${fileTimestamp(now)}_${rand}${ext}`;
}

export function createLogoStore(baseDir: string, clock: () => Date = () => new Date()): LogoStore {
  const root = path.resolve(baseDir);

  return {
    async store(bytes, mimetype, prefix = "logo") {
      const filename = buildLogoFilename(prefix, mimetype, clock());
      await fs.mkdir(root, { recursive: true });
      await fs.writeFile(path.join(root, filename), bytes);
      return `${LOGO_PUBLIC_PREFIX}/${filename}`;
    },

    resolve(ref) {
      if (!ref) return null;
      const [head, ...rest] = ref.split("/");
      if (head !== LOGO_PUBLIC_PREFIX || rest.length !== 1) return null;
      const filename = rest[0];
      if (!filename || filename === "." || filename === ".." || filename !== path.basename(filename)) return null;
      return path.join(root, filename);
    },
  };
}

export const logoStore = createLogoStore(env.LOGO_DIR);
