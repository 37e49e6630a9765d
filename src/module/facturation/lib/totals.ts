type LineLike = {
  quantite: number;
  prix_unitaire: number;
};

export type DocumentTotals = {
  total_ht: number;
  montant_tva: number;
  total_ttc: number;
};

// Les montants restent en pleine précision ; l'arrondi n'intervient qu'à l'affichage.
export function computeLineTotal(line: LineLike): number {
  const qte = Number.isFinite(line.quantite) ? line.quantite : 0;
  const pu = Number.isFinite(line.prix_unitaire) ? line.prix_unitaire : 0;
  return qte * pu;
}

export function computeDocumentTotals(lines: readonly LineLike[], tva_pourcent: number): DocumentTotals {
  const tva = Number.isFinite(tva_pourcent) ? tva_pourcent : 0;
  const total_ht = lines.reduce((s, l) => s + computeLineTotal(l), 0);
  const montant_tva = (total_ht * tva) / 100;
  const total_ttc = total_ht + montant_tva;
  return { total_ht, montant_tva, total_ttc };
}

export function round2(n: number): number {
  return Math.round((n + Number.EPSILON) * 100) / 100;
}

/** 1234.5 -> "1234.50" */
export function formatMontant(n: number): string {
  return (Number.isFinite(n) ? round2(n) : 0).toFixed(2);
}
