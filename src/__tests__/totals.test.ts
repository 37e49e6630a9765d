import { describe, it, expect } from "vitest";
import { computeDocumentTotals, computeLineTotal, formatMontant, round2 } from "../module/facturation/lib/totals";

// Générateur déterministe pour les tests de propriété
function lcg(seed: number) {
  let s = seed;
  return () => {
    s = (s * 16807) % 2147483647;
    return (s - 1) / 2147483646;
  };
}

describe("totaux de facture", () => {
  it("10 × 25 + 2 × 100 à 20 % => 450 / 90 / 540", () => {
    const totals = computeDocumentTotals(
      [
        { quantite: 10, prix_unitaire: 25 },
        { quantite: 2, prix_unitaire: 100 },
      ],
      20
    );
    expect(totals).toEqual({ total_ht: 450, montant_tva: 90, total_ttc: 540 });
  });

  it("document sans ligne => tout à zéro", () => {
    expect(computeDocumentTotals([], 20)).toEqual({ total_ht: 0, montant_tva: 0, total_ttc: 0 });
  });

  it("TVA à 0 % => TTC = HT", () => {
    expect(computeDocumentTotals([{ quantite: 3, prix_unitaire: 12.5 }], 0)).toEqual({
      total_ht: 37.5,
      montant_tva: 0,
      total_ttc: 37.5,
    });
  });

  it("valeurs non finies comptées comme 0", () => {
    expect(computeLineTotal({ quantite: Number.NaN, prix_unitaire: 10 })).toBe(0);
    expect(computeDocumentTotals([{ quantite: 2, prix_unitaire: 5 }], Number.NaN).montant_tva).toBe(0);
  });

  it("pas d'arrondi par ligne : le total garde la pleine précision", () => {
    expect(computeLineTotal({ quantite: 3, prix_unitaire: 0.1 })).toBe(3 * 0.1);
    expect(formatMontant(computeLineTotal({ quantite: 3, prix_unitaire: 0.1 }))).toBe("0.30");
  });

  it("propriété : HT = somme des lignes et TTC = HT + TVA (à 0,01 près)", () => {
    const rand = lcg(42);
    for (let run = 0; run < 200; run += 1) {
      const count = 1 + Math.floor(rand() * 8);
      const lines = Array.from({ length: count }, () => ({
        quantite: Math.round((0.01 + rand() * 50) * 100) / 100,
        prix_unitaire: Math.round(rand() * 100000) / 100,
      }));
      const tva = [0, 5.5, 10, 20][Math.floor(rand() * 4)] ?? 20;

      const t = computeDocumentTotals(lines, tva);
      const sum = lines.reduce((s, l) => s + l.quantite * l.prix_unitaire, 0);

      expect(Math.abs(t.total_ht - sum)).toBeLessThan(0.01);
      expect(Math.abs(t.montant_tva - (t.total_ht * tva) / 100)).toBeLessThan(0.01);
      expect(Math.abs(t.total_ttc - (t.total_ht + t.montant_tva))).toBeLessThan(0.01);
    }
  });
});

describe("formatage des montants", () => {
  it("deux décimales", () => {
    expect(formatMontant(1234.5)).toBe("1234.50");
    expect(formatMontant(2 / 3)).toBe("0.67");
    expect(formatMontant(Number.NaN)).toBe("0.00");
  });

  it("round2", () => {
    expect(round2(10.456)).toBe(10.46);
    expect(round2(-3.333)).toBe(-3.33);
  });
});
