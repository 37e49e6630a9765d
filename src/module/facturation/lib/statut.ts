export const STATUTS_FACTURE = ["EN_ATTENTE", "PAYEE", "ANNULEE"] as const;

export type StatutFacture = (typeof STATUTS_FACTURE)[number];

export const STATUT_INITIAL: StatutFacture = "EN_ATTENTE";

export const STATUT_LABELS: Record<StatutFacture, string> = {
  EN_ATTENTE: "En attente",
  PAYEE: "Payée",
  ANNULEE: "Annulée",
};

// Aucun état terminal : une facture payée peut repasser en attente ou être annulée.
const TRANSITIONS: Record<StatutFacture, readonly StatutFacture[]> = {
  EN_ATTENTE: ["EN_ATTENTE", "PAYEE", "ANNULEE"],
  PAYEE: ["EN_ATTENTE", "PAYEE", "ANNULEE"],
  ANNULEE: ["EN_ATTENTE", "PAYEE", "ANNULEE"],
};

export function isStatutFacture(value: unknown): value is StatutFacture {
  return typeof value === "string" && (STATUTS_FACTURE as readonly string[]).includes(value);
}

export function canTransition(from: StatutFacture, to: StatutFacture): boolean {
  return TRANSITIONS[from].includes(to);
}

export type TransitionPlan =
  | { allowed: false }
  | { allowed: true; changed: boolean };

export function planTransition(from: StatutFacture, to: StatutFacture): TransitionPlan {
  if (!canTransition(from, to)) return { allowed: false };
  return { allowed: true, changed: from !== to };
}
