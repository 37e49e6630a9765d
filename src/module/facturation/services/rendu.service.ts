import { repoGetClient } from "../../client/repository/client.repository";
import { repoGetFournisseur } from "../../fournisseur/repository/fournisseur.repository";
import type { FactureRenderData } from "../types/factures.types";
import { svcGetFacture } from "./factures.service";

/** client est null quand le client a été supprimé après émission de la facture. */
export async function svcGetInvoiceRenderData(id: number): Promise<FactureRenderData> {
  const { facture, lignes } = await svcGetFacture(id);
  const [fournisseur, client] = await Promise.all([repoGetFournisseur(), repoGetClient(facture.client_id)]);
  return { fournisseur, client, facture, lignes };
}
