import type { RequestHandler } from "express";
import {
  commitBrouillonBodySchema,
  sessionParamsSchema,
  totauxQuerySchema,
} from "../validators/brouillon.validators";
import {
  svcAbandonBrouillon,
  svcAddLigne,
  svcClearLignes,
  svcCommitBrouillon,
  svcCreateBrouillon,
  svcGetBrouillon,
  svcTotaux,
} from "../services/brouillons.service";

export const createBrouillon: RequestHandler = (_req, res) => {
  res.status(201).json(svcCreateBrouillon());
};

export const getBrouillon: RequestHandler = (req, res, next) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    const { tva_pourcent } = totauxQuerySchema.parse(req.query);
    res.json(svcGetBrouillon(sessionId, tva_pourcent));
  } catch (err) {
    next(err);
  }
};

export const addLigne: RequestHandler = (req, res, next) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    res.status(201).json(svcAddLigne(sessionId, req.body));
  } catch (err) {
    next(err);
  }
};

export const clearLignes: RequestHandler = (req, res, next) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    res.json(svcClearLignes(sessionId));
  } catch (err) {
    next(err);
  }
};

export const getTotaux: RequestHandler = (req, res, next) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    const { tva_pourcent } = totauxQuerySchema.parse(req.query);
    res.json(svcTotaux(sessionId, tva_pourcent));
  } catch (err) {
    next(err);
  }
};

export const commitBrouillon: RequestHandler = async (req, res, next) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    const dto = commitBrouillonBodySchema.parse(req.body);
    res.status(201).json(await svcCommitBrouillon(sessionId, dto));
  } catch (err) {
    next(err);
  }
};

export const abandonBrouillon: RequestHandler = (req, res, next) => {
  try {
    const { sessionId } = sessionParamsSchema.parse(req.params);
    svcAbandonBrouillon(sessionId);
    res.status(204).send();
  } catch (err) {
    next(err);
  }
};
