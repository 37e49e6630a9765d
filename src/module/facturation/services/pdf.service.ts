import fs from "node:fs";
import PDFDocument from "pdfkit";
import logger from "../../../utils/logger";
import { formatDateFR } from "../../../utils/dates";
import { logoStore, type LogoStore } from "../../fichiers/logo-store";
import { formatMontant } from "../lib/totals";
import { STATUT_LABELS } from "../lib/statut";
import type { FactureLine, FactureRenderData } from "../types/factures.types";

function formatCurrencyEUR(amount: number): string {
  return `${formatMontant(amount)} EUR`;
}

function formatQuantite(q: number): string {
  return Number.isInteger(q) ? String(q) : q.toFixed(2);
}

const COLUMNS = [
  { label: "Description", width: 215, align: "left" },
  { label: "Type", width: 50, align: "left" },
  { label: "Qte", width: 50, align: "right" },
  { label: "PU HT", width: 80, align: "right" },
  { label: "Total HT", width: 120, align: "right" },
] as const;

const TABLE_WIDTH = COLUMNS.reduce((a, c) => a + c.width, 0);

function renderTableRow(doc: PDFKit.PDFDocument, x: number, y: number, cells: readonly string[]) {
  let cx = x;
  COLUMNS.forEach((col, i) => {
    doc.text(cells[i] ?? "", cx, y, { width: col.width, align: col.align });
    cx += col.width;
  });
}

function renderTableHeader(doc: PDFKit.PDFDocument, x: number, y: number) {
  doc.fontSize(9).fillColor("#111111").font("Helvetica-Bold");
  renderTableRow(
    doc,
    x,
    y,
    COLUMNS.map((c) => c.label)
  );
  doc.moveTo(x, y + 14).lineTo(x + TABLE_WIDTH, y + 14).strokeColor("#e5e7eb").stroke();
  doc.font("Helvetica").fillColor("#111111");
}

function renderLines(doc: PDFKit.PDFDocument, lignes: readonly FactureLine[], startY: number) {
  const marginX = doc.page.margins.left;
  const maxY = doc.page.height - doc.page.margins.bottom - 80;
  let y = startY;

  renderTableHeader(doc, marginX, y);
  y += 22;
  doc.fontSize(9);

  for (const l of lignes) {
    const rowHeight = Math.max(14, doc.heightOfString(l.description, { width: COLUMNS[0].width }));
    if (y + rowHeight > maxY) {
      doc.addPage();
      y = doc.page.margins.top;
      renderTableHeader(doc, marginX, y);
      y += 22;
      doc.fontSize(9);
    }

    renderTableRow(doc, marginX, y, [
      l.description,
      l.type_facturation,
      formatQuantite(l.quantite),
      formatCurrencyEUR(l.prix_unitaire),
      formatCurrencyEUR(l.total),
    ]);

    y += rowHeight + 6;
    doc.moveTo(marginX, y).lineTo(marginX + TABLE_WIDTH, y).strokeColor("#f1f5f9").stroke();
    y += 6;
  }

  return y;
}

const TOTALS_BLOCK_HEIGHT = 60;

/** Ordonnée du bloc des totaux ; nouvelle page s'il ne tient pas sous le tableau. */
export function placeTotalsBlock(doc: PDFKit.PDFDocument, afterLinesY: number): number {
  const y = afterLinesY + 10;
  if (y + TOTALS_BLOCK_HEIGHT <= doc.page.height - doc.page.margins.bottom) return y;
  doc.addPage();
  return doc.page.margins.top;
}

function drawLogo(doc: PDFKit.PDFDocument, filePath: string | null, x: number, y: number) {
  if (!filePath || !fs.existsSync(filePath)) return;
  try {
    doc.image(filePath, x, y, { fit: [130, 70] });
  } catch (err) {
    logger.warn(`Logo illisible ignoré (${filePath})`, err);
  }
}

function writePdfToBuffer(render: (doc: PDFKit.PDFDocument) => void): Promise<Buffer> {
  const doc = new PDFDocument({ size: "A4", margin: 40 });
  const chunks: Buffer[] = [];

  const done = new Promise<Buffer>((resolve, reject) => {
    doc.on("data", (c: Buffer) => chunks.push(c));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", (err: Error) => reject(err));
  });

  render(doc);
  doc.end();
  return done;
}

export function pdfFileName(data: FactureRenderData): string {
  return `Facture_${data.facture.numero}.pdf`;
}

export function renderFacturePdf(data: FactureRenderData, store: LogoStore = logoStore): Promise<Buffer> {
  const { fournisseur, client, facture: f, lignes } = data;

  return writePdfToBuffer((doc) => {
    doc.info.Title = `Facture ${f.numero}`;
    const left = doc.page.margins.left;
    const right = doc.page.width - doc.page.margins.right;
    const top = doc.page.margins.top;

    drawLogo(doc, store.resolve(fournisseur?.logo_path), left, top);
    drawLogo(doc, store.resolve(client?.logo_path), right - 130, top);

    doc.y = top + 80;
    if (fournisseur) {
      doc.font("Helvetica-Bold").fontSize(12).fillColor("#111111").text(fournisseur.nom, left);
      doc.font("Helvetica").fontSize(9);
      for (const line of [fournisseur.adresse, fournisseur.email, fournisseur.telephone]) {
        if (line) doc.text(line);
      }
      if (fournisseur.siret) doc.text(`SIRET : ${fournisseur.siret}`);
      if (fournisseur.tva_intra) doc.text(`TVA intracom. : ${fournisseur.tva_intra}`);
    }

    const blockY = doc.y + 20;
    doc.font("Helvetica-Bold").fontSize(11).text("Facturer à :", left, blockY);
    doc.font("Helvetica").fontSize(10);
    if (client) {
      doc.text(`${client.nom} ${client.prenom ?? ""}`.trim());
      if (client.adresse) doc.text(client.adresse);
      const cityLine = `${client.code_postal ?? ""} ${client.ville ?? ""}`.trim();
      if (cityLine) doc.text(cityLine);
      if (client.pays) doc.text(client.pays);
    } else {
      doc.fillColor("#6b7280").text(`Client #${f.client_id} (supprimé)`).fillColor("#111111");
    }
    const afterClientY = doc.y;

    const infoX = left + 300;
    doc.font("Helvetica-Bold").fontSize(16).text("FACTURE", infoX, blockY, { width: right - infoX, align: "right" });
    doc.font("Helvetica").fontSize(10);
    doc.text(`N° ${f.numero}`, { width: right - infoX, align: "right" });
    doc.text(`Date : ${formatDateFR(f.date_emission)}`, { width: right - infoX, align: "right" });
    doc.text(`Statut : ${STATUT_LABELS[f.statut]}`, { width: right - infoX, align: "right" });

    const afterLinesY = renderLines(doc, lignes, Math.max(afterClientY, doc.y) + 24);

    const boxY = placeTotalsBlock(doc, afterLinesY);
    doc.font("Helvetica").fontSize(10).fillColor("#111111");
    doc.text(`Total HT : ${formatCurrencyEUR(f.total_ht)}`, left, boxY, { width: TABLE_WIDTH, align: "right" });
    doc.text(`TVA (${f.tva_pourcent}%) : ${formatCurrencyEUR(f.montant_tva)}`, { width: TABLE_WIDTH, align: "right" });
    doc.font("Helvetica-Bold").text(`Total TTC : ${formatCurrencyEUR(f.total_ttc)}`, { width: TABLE_WIDTH, align: "right" });

    if (f.notes) {
      doc.moveDown(1);
      doc.font("Helvetica-Bold").fontSize(10).text("Notes / Conditions de paiement", left);
      doc.font("Helvetica").fontSize(10).text(f.notes, { width: TABLE_WIDTH });
    }
  });
}
