import { describe, it, expect } from "vitest";
import {
  formatNumeroFacture,
  nextNumeroFacture,
  nextSequence,
  parseNumeroFacture,
} from "../module/facturation/lib/numerotation";

describe("numérotation des factures", () => {
  it("F{année}-{séquence sur 4 chiffres}", () => {
    expect(formatNumeroFacture(2026, 1)).toBe("F2026-0001");
    expect(formatNumeroFacture(2026, 42)).toBe("F2026-0042");
    expect(formatNumeroFacture(2026, 12345)).toBe("F2026-12345");
  });

  it("parse un numéro valide", () => {
    expect(parseNumeroFacture("F2026-0042")).toEqual({ year: 2026, sequence: 42 });
    expect(parseNumeroFacture(" F2027-0001 ")).toEqual({ year: 2027, sequence: 1 });
  });

  it("rejette un numéro hors format", () => {
    expect(parseNumeroFacture("DV-7")).toBeNull();
    expect(parseNumeroFacture("F26-0001")).toBeNull();
    expect(parseNumeroFacture("F2026-12")).toBeNull();
  });

  it("annuelle : max de l'année + 1", () => {
    expect(nextSequence("annuelle", { total: 57, maxSequenceAnnee: 3 })).toBe(4);
  });

  it("annuelle : repart à 0001 en début d'année", () => {
    expect(nextNumeroFacture("annuelle", 2027, { total: 120, maxSequenceAnnee: 0 })).toBe("F2027-0001");
  });

  it("globale : nombre total de factures + 1, sans remise à zéro", () => {
    expect(nextSequence("globale", { total: 57, maxSequenceAnnee: 3 })).toBe(58);
    expect(nextNumeroFacture("globale", 2027, { total: 120, maxSequenceAnnee: 0 })).toBe("F2027-0121");
  });

  it("première facture => F{année}-0001 dans les deux modes", () => {
    const empty = { total: 0, maxSequenceAnnee: 0 };
    expect(nextNumeroFacture("annuelle", 2026, empty)).toBe("F2026-0001");
    expect(nextNumeroFacture("globale", 2026, empty)).toBe("F2026-0001");
  });
});
