// src/module/client/repository/client.repository.ts
import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { isUniqueViolation } from "../../../utils/pgErrors";
import type { Client } from "../types/client.types";
import type { CreateClientDTO } from "../validators/client.validators";

const CLIENT_COLUMNS = `
  id,
  code_client,
  nom,
  prenom,
  email,
  telephone,
  adresse,
  code_postal,
  ville,
  pays,
  logo_path,
  created_at::text AS created_at,
  updated_at::text AS updated_at
`;

export async function repoCreateClient(dto: CreateClientDTO): Promise<number> {
  try {
    const { rows } = await pool.query<{ id: number }>(
      `
      INSERT INTO clients (code_client, nom, prenom, email, telephone, adresse, code_postal, ville, pays)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, COALESCE($9, 'France'))
      RETURNING id
      `,
      [
        dto.code_client ?? null,
        dto.nom,
        dto.prenom ?? null,
        dto.email ?? null,
        dto.telephone ?? null,
        dto.adresse ?? null,
        dto.code_postal ?? null,
        dto.ville ?? null,
        dto.pays ?? null,
      ]
    );
    const id = rows[0]?.id;
    if (id === undefined) throw new Error("Failed to insert client");
    return id;
  } catch (err) {
    if (isUniqueViolation(err, "clients_code_client_key")) {
      throw new HttpError(409, "CLIENT_CODE_EXISTS", `Le code client ${dto.code_client ?? ""} existe déjà`);
    }
    throw err;
  }
}

export async function repoGetClient(id: number): Promise<Client | null> {
  const { rows } = await pool.query<Client>(`SELECT ${CLIENT_COLUMNS} FROM clients WHERE id = $1`, [id]);
  return rows[0] ?? null;
}

export async function repoListClients(): Promise<Client[]> {
  const { rows } = await pool.query<Client>(
    `SELECT ${CLIENT_COLUMNS} FROM clients ORDER BY created_at DESC, id DESC`
  );
  return rows;
}

export async function repoCountFacturesForClient(id: number): Promise<number> {
  const { rows } = await pool.query<{ total: number }>(
    `SELECT COUNT(*)::int AS total FROM facture WHERE client_id = $1`,
    [id]
  );
  return rows[0]?.total ?? 0;
}

export async function repoDeleteClient(id: number): Promise<boolean> {
  const { rowCount } = await pool.query(`DELETE FROM clients WHERE id = $1`, [id]);
  return (rowCount ?? 0) > 0;
}

export async function repoSetClientLogo(id: number, logoPath: string): Promise<boolean> {
  const { rowCount } = await pool.query(
    `UPDATE clients SET logo_path = $2, updated_at = now() WHERE id = $1`,
    [id, logoPath]
  );
  return (rowCount ?? 0) > 0;
}
