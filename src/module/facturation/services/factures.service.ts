import { env } from "../../../config/env";
import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { planTransition, type StatutFacture } from "../lib/statut";
import type { CommitFactureInput, CommitFactureResult, FactureDetail } from "../types/factures.types";
import type { ListFacturesQueryDTO } from "../validators/factures.validators";
import {
  repoCommitFacture,
  repoFacturesSummary,
  repoGetFacture,
  repoGetFactureIdByNumero,
  repoGetFactureStatut,
  repoListFactures,
  repoUpdateFactureStatut,
} from "../repository/factures.repository";

export const MAX_NUMEROTATION_ATTEMPTS = 3;

export const svcListFactures = (filters: ListFacturesQueryDTO) => repoListFactures(filters);

export const svcFacturesSummary = () => repoFacturesSummary();

export async function svcGetFacture(id: number): Promise<FactureDetail> {
  const detail = await repoGetFacture(id);
  if (!detail) throw new HttpError(404, "FACTURE_NOT_FOUND", "Facture introuvable");
  return detail;
}

export async function svcGetFactureByNumero(numero: string): Promise<FactureDetail> {
  const id = await repoGetFactureIdByNumero(numero);
  if (id === null) throw new HttpError(404, "FACTURE_NOT_FOUND", `Facture ${numero} introuvable`);
  return svcGetFacture(id);
}

/**
 * Enregistre une facture et ses lignes. Une collision sur le numéro rejoue
 * toute l'unité (numérotation + insertion) au plus MAX_NUMEROTATION_ATTEMPTS fois.
 */
export async function svcCommitFacture(input: CommitFactureInput, now = new Date()): Promise<CommitFactureResult> {
  for (let attempt = 1; attempt <= MAX_NUMEROTATION_ATTEMPTS; attempt += 1) {
    try {
      const out = await repoCommitFacture(input, { mode: env.FACTURE_NUMEROTATION, now });
      logger.info(`🧾 Facture ${out.numero} enregistrée (id=${out.id}, ${input.lignes.length} ligne(s))`);
      return out;
    } catch (err) {
      if (err instanceof HttpError && err.code === "FACTURE_NUMERO_EXISTS") {
        logger.warn(`Collision de numéro de facture (tentative ${attempt}/${MAX_NUMEROTATION_ATTEMPTS})`);
        continue;
      }
      throw err;
    }
  }
  throw new HttpError(
    409,
    "NUMBERING_CONFLICT",
    `Impossible d'attribuer un numéro de facture après ${MAX_NUMEROTATION_ATTEMPTS} tentatives`
  );
}

export type SetStatutResult = { id: number; statut: StatutFacture; changed: boolean };

export async function svcSetStatut(id: number, statut: StatutFacture): Promise<SetStatutResult> {
  const current = await repoGetFactureStatut(id);
  if (current === null) throw new HttpError(404, "FACTURE_NOT_FOUND", "Facture introuvable");

  const plan = planTransition(current, statut);
  if (!plan.allowed) {
    throw new HttpError(409, "TRANSITION_INTERDITE", `Passage de ${current} à ${statut} non autorisé`);
  }
  if (!plan.changed) return { id, statut, changed: false };

  const ok = await repoUpdateFactureStatut(id, statut);
  if (!ok) throw new HttpError(404, "FACTURE_NOT_FOUND", "Facture introuvable");
  logger.info(`Facture ${id} : ${current} -> ${statut}`);
  return { id, statut, changed: true };
}
