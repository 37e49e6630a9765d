import type { Request, Response } from "express";
import { asyncHandler } from "../../../utils/asyncHandler";
import { HttpError } from "../../../utils/httpError";
import { replaceFournisseurSchema } from "../validators/fournisseur.validators";
import {
  svcGetFournisseur,
  svcReplaceFournisseur,
  svcSetFournisseurLogo,
} from "../services/fournisseur.service";

export const getFournisseur = asyncHandler(async (_req: Request, res: Response) => {
  res.json(await svcGetFournisseur());
});

export const putFournisseur = asyncHandler(async (req: Request, res: Response) => {
  const dto = replaceFournisseurSchema.parse(req.body);
  res.json(await svcReplaceFournisseur(dto));
});

export const uploadFournisseurLogo = asyncHandler(async (req: Request, res: Response) => {
  if (!req.file) throw new HttpError(400, "VALIDATION_ERROR", "Fichier logo manquant (champ \"logo\")");
  res.status(201).json(await svcSetFournisseurLogo(req.file));
});
