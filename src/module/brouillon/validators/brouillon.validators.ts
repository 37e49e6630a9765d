import { z } from "zod";
import { tvaPourcentSchema } from "../../facturation/validators/factures.validators";

function emptyStringToNull(value: unknown) {
  if (typeof value !== "string") return value;
  return value.trim() === "" ? null : value;
}

export const sessionParamsSchema = z.object({
  sessionId: z.string().uuid(),
});

export const totauxQuerySchema = z.object({
  tva_pourcent: tvaPourcentSchema,
});

export const commitBrouillonBodySchema = z.object({
  client_id: z.coerce.number().int().positive(),
  tva_pourcent: tvaPourcentSchema,
  notes: z.preprocess(emptyStringToNull, z.string().trim().max(2000).nullable().optional()),
});

export type CommitBrouillonBodyDTO = z.infer<typeof commitBrouillonBodySchema>;
