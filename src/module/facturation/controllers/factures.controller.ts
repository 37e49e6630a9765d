import type { RequestHandler } from "express";
import {
  createFactureBodySchema,
  factureIdParamsSchema,
  factureNumeroParamsSchema,
  listFacturesQuerySchema,
  pdfQuerySchema,
  updateStatutBodySchema,
} from "../validators/factures.validators";
import {
  svcCommitFacture,
  svcFacturesSummary,
  svcGetFacture,
  svcGetFactureByNumero,
  svcListFactures,
  svcSetStatut,
} from "../services/factures.service";
import { svcGetInvoiceRenderData } from "../services/rendu.service";
import { pdfFileName, renderFacturePdf } from "../services/pdf.service";

export const listFactures: RequestHandler = async (req, res, next) => {
  try {
    const query = listFacturesQuerySchema.parse(req.query);
    res.json(await svcListFactures(query));
  } catch (err) {
    next(err);
  }
};

export const getFacturesSummary: RequestHandler = async (_req, res, next) => {
  try {
    res.json(await svcFacturesSummary());
  } catch (err) {
    next(err);
  }
};

export const getFacture: RequestHandler = async (req, res, next) => {
  try {
    const { id } = factureIdParamsSchema.parse(req.params);
    res.json(await svcGetFacture(id));
  } catch (err) {
    next(err);
  }
};

export const getFactureByNumero: RequestHandler = async (req, res, next) => {
  try {
    const { numero } = factureNumeroParamsSchema.parse(req.params);
    res.json(await svcGetFactureByNumero(numero));
  } catch (err) {
    next(err);
  }
};

export const createFacture: RequestHandler = async (req, res, next) => {
  try {
    const dto = createFactureBodySchema.parse(req.body);
    const out = await svcCommitFacture({
      client_id: dto.client_id,
      lignes: dto.lignes,
      tva_pourcent: dto.tva_pourcent,
      notes: dto.notes ?? null,
    });
    res.status(201).json(out);
  } catch (err) {
    next(err);
  }
};

export const updateFactureStatut: RequestHandler = async (req, res, next) => {
  try {
    const { id } = factureIdParamsSchema.parse(req.params);
    const { statut } = updateStatutBodySchema.parse(req.body);
    res.json(await svcSetStatut(id, statut));
  } catch (err) {
    next(err);
  }
};

export const getFactureRenderData: RequestHandler = async (req, res, next) => {
  try {
    const { id } = factureIdParamsSchema.parse(req.params);
    res.json(await svcGetInvoiceRenderData(id));
  } catch (err) {
    next(err);
  }
};

export const getFacturePdf: RequestHandler = async (req, res, next) => {
  try {
    const { id } = factureIdParamsSchema.parse(req.params);
    const { download } = pdfQuerySchema.parse(req.query);

    const data = await svcGetInvoiceRenderData(id);
    const pdf = await renderFacturePdf(data);

    const disposition = download ? "attachment" : "inline";
    res.setHeader("Content-Type", "application/pdf");
    res.setHeader("Content-Disposition", `${disposition}; filename="${pdfFileName(data).replace(/"/g, "")}"`);
    res.send(pdf);
  } catch (err) {
    next(err);
  }
};
