import pool from "../../../config/database";
import type { Fournisseur } from "../types/fournisseur.types";
import type { ReplaceFournisseurDTO } from "../validators/fournisseur.validators";

export const FOURNISSEUR_PAR_DEFAUT = "Mon Entreprise";

const FOURNISSEUR_COLUMNS = `
  nom,
  adresse,
  email,
  telephone,
  logo_path,
  siret,
  tva_intra,
  updated_at::text AS updated_at
`;

/** Crée la ligne unique (id = 1) avec des valeurs provisoires si elle n'existe pas. */
export async function repoEnsureFournisseur(): Promise<boolean> {
  const { rowCount } = await pool.query(
    `INSERT INTO fournisseur (id, nom) VALUES (1, $1) ON CONFLICT (id) DO NOTHING`,
    [FOURNISSEUR_PAR_DEFAUT]
  );
  return (rowCount ?? 0) > 0;
}

export async function repoGetFournisseur(): Promise<Fournisseur | null> {
  const { rows } = await pool.query<Fournisseur>(`SELECT ${FOURNISSEUR_COLUMNS} FROM fournisseur WHERE id = 1`);
  return rows[0] ?? null;
}

export async function repoReplaceFournisseur(dto: ReplaceFournisseurDTO): Promise<Fournisseur> {
  const { rows } = await pool.query<Fournisseur>(
    `
    INSERT INTO fournisseur (id, nom, adresse, email, telephone, siret, tva_intra, updated_at)
    VALUES (1, $1, $2, $3, $4, $5, $6, now())
    ON CONFLICT (id) DO UPDATE SET
      nom = EXCLUDED.nom,
      adresse = EXCLUDED.adresse,
      email = EXCLUDED.email,
      telephone = EXCLUDED.telephone,
      siret = EXCLUDED.siret,
      tva_intra = EXCLUDED.tva_intra,
      updated_at = now()
    RETURNING ${FOURNISSEUR_COLUMNS}
    `,
    [dto.nom, dto.adresse ?? null, dto.email ?? null, dto.telephone ?? null, dto.siret ?? null, dto.tva_intra ?? null]
  );
  const row = rows[0];
  if (!row) throw new Error("Failed to upsert fournisseur");
  return row;
}

export async function repoSetFournisseurLogo(logoPath: string): Promise<boolean> {
  const { rowCount } = await pool.query(
    `UPDATE fournisseur SET logo_path = $1, updated_at = now() WHERE id = 1`,
    [logoPath]
  );
  return (rowCount ?? 0) > 0;
}
