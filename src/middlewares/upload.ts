import multer from "multer";
import { env } from "../config/env";
import { HttpError } from "../utils/httpError";
import { isAcceptedLogo } from "../module/fichiers/logo-types";

// Les octets restent en mémoire : c'est le logo store qui décide où les écrire.
export const uploadLogo = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: env.LOGO_MAX_BYTES,
    files: 1,
  },
  fileFilter: (_req, file, cb) => {
    if (!isAcceptedLogo(file)) {
      return cb(new HttpError(400, "VALIDATION_ERROR", "Seules les images PNG, JPEG, GIF ou WebP sont autorisées"));
    }
    cb(null, true);
  },
});
