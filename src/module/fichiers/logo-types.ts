import path from "node:path";

/** Formats de logo acceptés et l'extension écrite sur disque. Pas de SVG : il peut embarquer du script. */
export const LOGO_EXTENSIONS: Readonly<Record<string, string>> = {
  "image/png": ".png",
  "image/jpeg": ".jpg",
  "image/gif": ".gif",
  "image/webp": ".webp",
};

const NOM_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".gif", ".webp"]);

export function logoExtension(mimetype: string): string | null {
  return LOGO_EXTENSIONS[mimetype.toLowerCase()] ?? null;
}

/** Type déclaré dans la liste, et nom de fichier sans extension ou avec une extension d'image. */
export function isAcceptedLogo(file: { mimetype: string; originalname: string }): boolean {
  if (!logoExtension(file.mimetype)) return false;
  const ext = path.extname(file.originalname).toLowerCase();
  return ext === "" || NOM_EXTENSIONS.has(ext);
}
