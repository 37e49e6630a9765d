import type { TypeFacturation } from "../validators/factures.validators";
import type { StatutFacture } from "../lib/statut";
import type { ClientLite } from "./shared.types";
import type { Client } from "../../client/types/client.types";
import type { Fournisseur } from "../../fournisseur/types/fournisseur.types";

export type FactureHeader = {
  id: number;
  numero: string;
  client_id: number;
  date_emission: string;
  total_ht: number;
  tva_pourcent: number;
  montant_tva: number;
  total_ttc: number;
  statut: StatutFacture;
  notes: string | null;
  created_at: string;
};

export type FactureLine = {
  id: number;
  facture_id: number;
  ordre: number;
  description: string;
  type_facturation: TypeFacturation;
  quantite: number;
  prix_unitaire: number;
  total: number;
};

export type FactureDetail = {
  facture: FactureHeader;
  lignes: FactureLine[];
};

/** Ligne de liste : en-tête + nom du client (null si le client a été supprimé). */
export type FactureListItem = FactureHeader & {
  client: ClientLite | null;
};

export type FacturesSummary = {
  total_factures: number;
  ca_ht: number;
  ca_ttc: number;
  en_attente: number;
};

export type CommitFactureInput = {
  client_id: number;
  lignes: ReadonlyArray<{
    description: string;
    type_facturation: TypeFacturation;
    quantite: number;
    prix_unitaire: number;
  }>;
  tva_pourcent: number;
  notes: string | null;
};

export type CommitFactureResult = { id: number; numero: string };

/** Instantané en lecture seule transmis aux moteurs de rendu (PDF, export). */
export type FactureRenderData = {
  fournisseur: Fournisseur | null;
  client: Client | null;
  facture: FactureHeader;
  lignes: FactureLine[];
};
