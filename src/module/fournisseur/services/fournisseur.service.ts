import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { logoStore, type LogoStore } from "../../fichiers/logo-store";
import type { Fournisseur } from "../types/fournisseur.types";
import type { ReplaceFournisseurDTO } from "../validators/fournisseur.validators";
import {
  repoEnsureFournisseur,
  repoGetFournisseur,
  repoReplaceFournisseur,
  repoSetFournisseurLogo,
} from "../repository/fournisseur.repository";

export async function svcEnsureFournisseur(): Promise<void> {
  const created = await repoEnsureFournisseur();
  if (created) logger.info("🏢 Fournisseur initialisé avec des valeurs par défaut");
}

export async function svcGetFournisseur(): Promise<Fournisseur> {
  const fournisseur = await repoGetFournisseur();
  if (!fournisseur) throw new HttpError(404, "FOURNISSEUR_NOT_FOUND", "Fournisseur non initialisé");
  return fournisseur;
}

export const svcReplaceFournisseur = (dto: ReplaceFournisseurDTO) => repoReplaceFournisseur(dto);

export async function svcSetFournisseurLogo(
  file: { buffer: Buffer; mimetype: string },
  store: LogoStore = logoStore
): Promise<{ logo_path: string }> {
  await svcGetFournisseur();
  const logoPath = await store.store(file.buffer, file.mimetype, "fournisseur");
  const ok = await repoSetFournisseurLogo(logoPath);
  if (!ok) throw new HttpError(404, "FOURNISSEUR_NOT_FOUND", "Fournisseur non initialisé");
  return { logo_path: logoPath };
}
