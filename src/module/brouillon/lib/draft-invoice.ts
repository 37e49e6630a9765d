import { computeDocumentTotals, computeLineTotal, type DocumentTotals } from "../../facturation/lib/totals";
import { factureLineSchema } from "../../facturation/validators/factures.validators";
import type { AddLineResult, DraftLine } from "../types/brouillon.types";

/**
 * Lignes d'une facture en cours de saisie, propres à une session.
 * Rien n'est persisté tant que commit n'a pas réussi.
 */
export class DraftInvoice {
  private lines: DraftLine[] = [];

  constructor(
    public readonly sessionId: string,
    public readonly createdAt: Date = new Date()
  ) {}

  get size(): number {
    return this.lines.length;
  }

  /** Une saisie invalide est rejetée sans toucher aux lignes existantes. */
  addLine(input: unknown): AddLineResult {
    const parsed = factureLineSchema.safeParse(input);
    if (!parsed.success) {
      return { ok: false, issues: parsed.error.flatten().fieldErrors };
    }

    const line: DraftLine = { ...parsed.data, total: computeLineTotal(parsed.data) };
    this.lines = [...this.lines, line];
    return { ok: true, line, count: this.lines.length };
  }

  clear(): void {
    this.lines = [];
  }

  getLines(): DraftLine[] {
    return this.lines.map((l) => ({ ...l }));
  }

  computeTotals(tva_pourcent: number): DocumentTotals {
    return computeDocumentTotals(this.lines, tva_pourcent);
  }
}
