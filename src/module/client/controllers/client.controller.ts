// src/module/client/controllers/client.controller.ts
import type { Request, Response } from "express";
import { asyncHandler } from "../../../utils/asyncHandler";
import { HttpError } from "../../../utils/httpError";
import { clientIdParamsSchema, createClientSchema } from "../validators/client.validators";
import {
  svcAddClient,
  svcDeleteClient,
  svcGetClient,
  svcListClients,
  svcSetClientLogo,
} from "../services/client.service";

export const postClient = asyncHandler(async (req: Request, res: Response) => {
  const dto = createClientSchema.parse(req.body);
  const id = await svcAddClient(dto);
  res.status(201).json({ id });
});

export const listClients = asyncHandler(async (_req: Request, res: Response) => {
  res.json(await svcListClients());
});

export const getClientById = asyncHandler(async (req: Request, res: Response) => {
  const { id } = clientIdParamsSchema.parse(req.params);
  res.json(await svcGetClient(id));
});

export const deleteClient = asyncHandler(async (req: Request, res: Response) => {
  const { id } = clientIdParamsSchema.parse(req.params);
  res.json(await svcDeleteClient(id));
});

// 🖼️ upload du logo client (champ multipart "logo")
export const uploadClientLogo = asyncHandler(async (req: Request, res: Response) => {
  const { id } = clientIdParamsSchema.parse(req.params);
  if (!req.file) throw new HttpError(400, "VALIDATION_ERROR", "Fichier logo manquant (champ \"logo\")");
  res.status(201).json(await svcSetClientLogo(id, req.file));
});
