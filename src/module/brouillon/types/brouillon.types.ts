import type { DocumentTotals } from "../../facturation/lib/totals";
import type { TypeFacturation } from "../../facturation/validators/factures.validators";

export type DraftLine = {
  description: string;
  type_facturation: TypeFacturation;
  quantite: number;
  prix_unitaire: number;
  total: number;
};

export type AddLineResult =
  | { ok: true; line: DraftLine; count: number }
  | { ok: false; issues: Record<string, string[] | undefined> };

export type DraftView = {
  session_id: string;
  created_at: string;
  tva_pourcent: number;
  lignes: DraftLine[];
  totaux: DocumentTotals;
};
