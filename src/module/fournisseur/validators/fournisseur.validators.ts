import { z } from "zod";

function emptyStringToNull(value: unknown) {
  if (typeof value !== "string") return value;
  return value.trim() === "" ? null : value;
}

const optionalText = (max: number) => z.preprocess(emptyStringToNull, z.string().trim().max(max).nullable().optional());

// PUT = remplacement complet : un champ absent est remis à null (sauf le logo, géré par /logo).
export const replaceFournisseurSchema = z.object({
  nom: z.string({ required_error: "Le nom est obligatoire" }).trim().min(1, "Le nom est obligatoire").max(200),
  adresse: optionalText(500),
  email: z.preprocess(emptyStringToNull, z.string().trim().email().nullable().optional()),
  telephone: optionalText(40),
  siret: optionalText(20),
  tva_intra: optionalText(20),
});

export type ReplaceFournisseurDTO = z.infer<typeof replaceFournisseurSchema>;
