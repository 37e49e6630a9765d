// src/module/client/validators/client.validators.ts
import { z } from "zod";

function emptyStringToNull(value: unknown) {
  if (typeof value !== "string") return value;
  return value.trim() === "" ? null : value;
}

const optionalText = (max: number) => z.preprocess(emptyStringToNull, z.string().trim().max(max).nullable().optional());

export const clientIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const createClientSchema = z.object({
  code_client: optionalText(30),
  nom: z.string({ required_error: "Le nom est obligatoire" }).trim().min(1, "Le nom est obligatoire").max(200),
  prenom: optionalText(200),
  email: z.preprocess(emptyStringToNull, z.string().trim().email().nullable().optional()),
  telephone: optionalText(40),
  adresse: optionalText(500),
  code_postal: optionalText(20),
  ville: optionalText(120),
  pays: z.preprocess(emptyStringToNull, z.string().trim().min(1).max(120).nullable().optional()),
});

export type CreateClientDTO = z.infer<typeof createClientSchema>;
