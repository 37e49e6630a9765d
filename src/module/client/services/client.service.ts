// src/module/client/services/client.service.ts
import { env } from "../../../config/env";
import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { logoStore, type LogoStore } from "../../fichiers/logo-store";
import type { Client, ClientDeletePolicy, DeleteClientResult } from "../types/client.types";
import type { CreateClientDTO } from "../validators/client.validators";
import {
  repoCountFacturesForClient,
  repoCreateClient,
  repoDeleteClient,
  repoGetClient,
  repoListClients,
  repoSetClientLogo,
} from "../repository/client.repository";

export const svcAddClient = (dto: CreateClientDTO) => repoCreateClient(dto);

export const svcListClients = () => repoListClients();

export async function svcGetClient(id: number): Promise<Client> {
  const client = await repoGetClient(id);
  if (!client) throw new HttpError(404, "CLIENT_NOT_FOUND", "Client introuvable");
  return client;
}

/**
 * detach : supprime le client, ses factures gardent une référence orpheline.
 * restrict : refuse tant qu'une facture pointe vers le client.
 */
export async function svcDeleteClient(
  id: number,
  policy: ClientDeletePolicy = env.CLIENT_DELETE_POLICY
): Promise<DeleteClientResult> {
  const factures = await repoCountFacturesForClient(id);
  if (factures > 0 && policy === "restrict") {
    throw new HttpError(
      409,
      "CLIENT_HAS_FACTURES",
      `Le client est référencé par ${factures} facture(s) et ne peut pas être supprimé`
    );
  }

  const ok = await repoDeleteClient(id);
  if (!ok) throw new HttpError(404, "CLIENT_NOT_FOUND", "Client introuvable");

  if (factures > 0) {
    logger.warn(`Client ${id} supprimé : ${factures} facture(s) conservent une référence orpheline`);
  }
  return { id, factures_detachees: factures };
}

export async function svcSetClientLogo(
  id: number,
  file: { buffer: Buffer; mimetype: string },
  store: LogoStore = logoStore
): Promise<{ id: number; logo_path: string }> {
  await svcGetClient(id);
  const logoPath = await store.store(file.buffer, file.mimetype, `client${id}`);
  const ok = await repoSetClientLogo(id, logoPath);
  if (!ok) throw new HttpError(404, "CLIENT_NOT_FOUND", "Client introuvable");
  return { id, logo_path: logoPath };
}
