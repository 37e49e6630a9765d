import { describe, it, expect } from "vitest";
import {
  STATUTS_FACTURE,
  STATUT_INITIAL,
  STATUT_LABELS,
  canTransition,
  isStatutFacture,
  planTransition,
} from "../module/facturation/lib/statut";

describe("statut de facture", () => {
  it("une facture naît en attente", () => {
    expect(STATUT_INITIAL).toBe("EN_ATTENTE");
    expect(STATUT_LABELS[STATUT_INITIAL]).toBe("En attente");
  });

  it("libellés d'affichage", () => {
    expect(STATUT_LABELS.PAYEE).toBe("Payée");
    expect(STATUT_LABELS.ANNULEE).toBe("Annulée");
  });

  it("toutes les transitions sont permises", () => {
    for (const from of STATUTS_FACTURE) {
      for (const to of STATUTS_FACTURE) {
        expect(canTransition(from, to)).toBe(true);
      }
    }
  });

  it("changement effectif", () => {
    expect(planTransition("EN_ATTENTE", "PAYEE")).toEqual({ allowed: true, changed: true });
    expect(planTransition("PAYEE", "EN_ATTENTE")).toEqual({ allowed: true, changed: true });
  });

  it("même statut => succès sans changement", () => {
    expect(planTransition("ANNULEE", "ANNULEE")).toEqual({ allowed: true, changed: false });
  });

  it("isStatutFacture", () => {
    expect(isStatutFacture("PAYEE")).toBe(true);
    expect(isStatutFacture("payee")).toBe(false);
    expect(isStatutFacture("BROUILLON")).toBe(false);
    expect(isStatutFacture(1)).toBe(false);
  });
});
