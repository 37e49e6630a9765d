export type NumerotationMode = "annuelle" | "globale";

/** État du registre des factures au moment d'attribuer un numéro. */
export type NumerotationState = {
  /** Nombre total de factures, toutes années confondues. */
  total: number;
  /** Plus grande séquence déjà émise pour l'année courante (0 si aucune). */
  maxSequenceAnnee: number;
};

const NUMERO_PATTERN = /^F(\d{4})-(\d{4,})$/;

export function formatNumeroFacture(year: number, sequence: number): string {
  return `F${year}-${String(sequence).padStart(4, "0")}`;
}

export function parseNumeroFacture(numero: string): { year: number; sequence: number } | null {
  const m = NUMERO_PATTERN.exec(numero.trim());
  if (!m) return null;
  return { year: Number.parseInt(m[1], 10), sequence: Number.parseInt(m[2], 10) };
}

/**
 * - annuelle : max(séquence de l'année) + 1, repart à 0001 chaque 1er janvier
 * - globale : COUNT(*) + 1 sur toutes les factures, sans remise à zéro
 */
export function nextSequence(mode: NumerotationMode, state: NumerotationState): number {
  return mode === "globale" ? state.total + 1 : state.maxSequenceAnnee + 1;
}

export function nextNumeroFacture(mode: NumerotationMode, year: number, state: NumerotationState): string {
  return formatNumeroFacture(year, nextSequence(mode, state));
}
