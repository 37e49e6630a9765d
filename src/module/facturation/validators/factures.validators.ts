import { z } from "zod";
import { STATUTS_FACTURE } from "../lib/statut";

export const TYPES_FACTURATION = ["m²", "ml", "m³", "pièce", "unité", "forfait", "jour", "heure"] as const;
export type TypeFacturation = (typeof TYPES_FACTURATION)[number];

export const TVA_PAR_DEFAUT = 20;

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Invalid date (expected YYYY-MM-DD)");

function emptyStringToNull(value: unknown) {
  if (typeof value !== "string") return value;
  return value.trim() === "" ? null : value;
}

export const factureIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const factureNumeroParamsSchema = z.object({
  numero: z.string().trim().min(1).max(30),
});

// "" (champ de formulaire ou query vide) vaut absent ; null reste refusé par z.number()
function numberInput(value: unknown) {
  if (typeof value !== "string") return value;
  return value.trim() === "" ? undefined : Number(value);
}

const nombre = (champ: string) =>
  z.number({ required_error: `${champ} obligatoire`, invalid_type_error: `${champ} doit être un nombre` }).finite();

/** Taux absent ou vide : TVA_PAR_DEFAUT. */
export const tvaPourcentSchema = z.preprocess(
  numberInput,
  nombre("Taux de TVA").min(0).max(100).default(TVA_PAR_DEFAUT)
);

export const factureLineSchema = z.object({
  description: z.string().trim().min(1, "Description obligatoire"),
  type_facturation: z.enum(TYPES_FACTURATION),
  quantite: z.preprocess(numberInput, nombre("Quantité").positive("La quantité doit être > 0")),
  prix_unitaire: z.preprocess(numberInput, nombre("Prix unitaire").min(0)),
});

export type FactureLineDTO = z.infer<typeof factureLineSchema>;

export const createFactureBodySchema = z.object({
  client_id: z.coerce.number().int().positive(),
  tva_pourcent: tvaPourcentSchema,
  notes: z.preprocess(emptyStringToNull, z.string().trim().max(2000).nullable().optional()),
  lignes: z.array(factureLineSchema).min(1, "Au moins une ligne est requise"),
});

export type CreateFactureBodyDTO = z.infer<typeof createFactureBodySchema>;

export const listFacturesQuerySchema = z.object({
  q: z.string().optional(),
  client_id: z.coerce.number().int().positive().optional(),
  statut: z.enum(STATUTS_FACTURE).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  page: z.coerce.number().int().min(1).optional().default(1),
  pageSize: z.coerce.number().int().min(1).max(200).optional().default(50),
  sortBy: z.enum(["numero", "date_emission", "total_ttc", "created_at"]).optional().default("date_emission"),
  sortDir: z.enum(["asc", "desc"]).optional().default("desc"),
});

export type ListFacturesQueryDTO = z.infer<typeof listFacturesQuerySchema>;

export const updateStatutBodySchema = z.object({
  statut: z.enum(STATUTS_FACTURE),
});

export type UpdateStatutBodyDTO = z.infer<typeof updateStatutBodySchema>;

export const pdfQuerySchema = z.object({
  download: z
    .preprocess((value) => {
      if (typeof value !== "string") return value;
      const v = value.trim().toLowerCase();
      return v === "true" || v === "1" || v === "yes";
    }, z.boolean())
    .optional()
    .default(false),
});
