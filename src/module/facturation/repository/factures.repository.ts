import type { PoolClient } from "pg";
import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { isUniqueViolation } from "../../../utils/pgErrors";
import { toIsoDate } from "../../../utils/dates";
import { computeDocumentTotals, computeLineTotal } from "../lib/totals";
import { nextNumeroFacture, type NumerotationMode } from "../lib/numerotation";
import type { StatutFacture } from "../lib/statut";
import type { ClientLite, Paginated } from "../types/shared.types";
import type {
  CommitFactureInput,
  CommitFactureResult,
  FactureDetail,
  FactureHeader,
  FactureLine,
  FactureListItem,
  FacturesSummary,
} from "../types/factures.types";
import type { ListFacturesQueryDTO } from "../validators/factures.validators";

// Clé du verrou consultatif qui sérialise attribution du numéro + insertion.
export const NUMEROTATION_LOCK_KEY = 7_250_001;

const HEADER_COLUMNS = `
  f.id,
  f.numero,
  f.client_id,
  f.date_emission::text AS date_emission,
  f.total_ht::float8 AS total_ht,
  f.tva_pourcent::float8 AS tva_pourcent,
  f.montant_tva::float8 AS montant_tva,
  f.total_ttc::float8 AS total_ttc,
  f.statut,
  f.notes,
  f.created_at::text AS created_at
`;

function sortColumn(sortBy: ListFacturesQueryDTO["sortBy"]) {
  switch (sortBy) {
    case "numero":
      return "f.numero";
    case "total_ttc":
      return "f.total_ttc";
    case "created_at":
      return "f.created_at";
    case "date_emission":
    default:
      return "f.date_emission";
  }
}

function sortDirection(sortDir: ListFacturesQueryDTO["sortDir"]) {
  return sortDir === "asc" ? "ASC" : "DESC";
}

type ListWhere = { whereSql: string; values: unknown[] };
function buildListWhere(filters: ListFacturesQueryDTO): ListWhere {
  const where: string[] = [];
  const values: unknown[] = [];
  const push = (v: unknown) => {
    values.push(v);
    return `$${values.length}`;
  };

  if (filters.q && filters.q.trim().length > 0) {
    const p = push(`%${filters.q.trim()}%`);
    where.push(`(f.numero ILIKE ${p} OR c.nom ILIKE ${p} OR c.prenom ILIKE ${p})`);
  }

  if (filters.client_id !== undefined) {
    where.push(`f.client_id = ${push(filters.client_id)}`);
  }

  if (filters.statut) {
    where.push(`f.statut = ${push(filters.statut)}`);
  }

  if (filters.from) {
    where.push(`f.date_emission >= ${push(filters.from)}::date`);
  }

  if (filters.to) {
    where.push(`f.date_emission <= ${push(filters.to)}::date`);
  }

  return {
    whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "",
    values,
  };
}

export async function repoListFactures(filters: ListFacturesQueryDTO): Promise<Paginated<FactureListItem>> {
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 50;
  const offset = (page - 1) * pageSize;

  const { whereSql, values } = buildListWhere(filters);

  const countRes = await pool.query<{ total: number }>(
    `
    SELECT COUNT(*)::int AS total
    FROM facture f
    LEFT JOIN clients c ON c.id = f.client_id
    ${whereSql}
    `,
    values
  );
  const total = countRes.rows[0]?.total ?? 0;

  const dataSql = `
    SELECT
      ${HEADER_COLUMNS},
      CASE WHEN c.id IS NULL THEN NULL ELSE jsonb_build_object(
        'id', c.id,
        'code_client', c.code_client,
        'nom', c.nom,
        'prenom', c.prenom
      ) END AS client
    FROM facture f
    LEFT JOIN clients c ON c.id = f.client_id
    ${whereSql}
    ORDER BY ${sortColumn(filters.sortBy)} ${sortDirection(filters.sortDir)}, f.id DESC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
  `;
  const dataRes = await pool.query<FactureHeader & { client: ClientLite | null }>(dataSql, [
    ...values,
    pageSize,
    offset,
  ]);

  return { items: dataRes.rows, total };
}

export async function repoGetFacture(id: number): Promise<FactureDetail | null> {
  const headerRes = await pool.query<FactureHeader>(
    `
    SELECT ${HEADER_COLUMNS}
    FROM facture f
    WHERE f.id = $1
    `,
    [id]
  );
  const facture = headerRes.rows[0] ?? null;
  if (!facture) return null;

  const lignesRes = await pool.query<FactureLine>(
    `
    SELECT
      id,
      facture_id,
      ordre,
      description,
      type_facturation,
      quantite::float8 AS quantite,
      prix_unitaire::float8 AS prix_unitaire,
      total::float8 AS total
    FROM facture_ligne
    WHERE facture_id = $1
    ORDER BY ordre ASC, id ASC
    `,
    [id]
  );

  return { facture, lignes: lignesRes.rows };
}

export async function repoGetFactureIdByNumero(numero: string): Promise<number | null> {
  const res = await pool.query<{ id: number }>(`SELECT id FROM facture WHERE numero = $1`, [numero]);
  return res.rows[0]?.id ?? null;
}

export async function repoFacturesSummary(): Promise<FacturesSummary> {
  const res = await pool.query<FacturesSummary>(
    `
    SELECT
      COUNT(*)::int AS total_factures,
      COALESCE(SUM(total_ht), 0)::float8 AS ca_ht,
      COALESCE(SUM(total_ttc), 0)::float8 AS ca_ttc,
      COUNT(*) FILTER (WHERE statut = 'EN_ATTENTE')::int AS en_attente
    FROM facture
    `
  );
  return res.rows[0] ?? { total_factures: 0, ca_ht: 0, ca_ttc: 0, en_attente: 0 };
}

async function insertFactureLines(client: PoolClient, factureId: number, lignes: CommitFactureInput["lignes"]) {
  if (!lignes.length) return;

  const params: unknown[] = [factureId];
  const valuesSql: string[] = [];

  for (let idx = 0; idx < lignes.length; idx += 1) {
    const l = lignes[idx];
    const baseIndex = params.length;
    params.push(idx + 1, l.description, l.type_facturation, l.quantite, l.prix_unitaire, computeLineTotal(l));

    const placeholders = Array.from({ length: 6 }, (_, j) => `$${baseIndex + 1 + j}`).join(",");
    valuesSql.push(`($1,${placeholders})`);
  }

  await client.query(
    `
    INSERT INTO facture_ligne (
      facture_id,
      ordre,
      description,
      type_facturation,
      quantite,
      prix_unitaire,
      total
    ) VALUES ${valuesSql.join(",")}
    `,
    params
  );
}

/**
 * Attribue le numéro, insère l'en-tête puis les lignes dans une seule transaction.
 * Le verrou consultatif est libéré au COMMIT/ROLLBACK.
 */
export async function repoCommitFacture(
  input: CommitFactureInput,
  opts: { mode: NumerotationMode; now: Date }
): Promise<CommitFactureResult> {
  const client = await pool.connect();
  // renseigné si ROLLBACK échoue : le client est alors détruit au lieu de revenir dans le pool
  let brokenConnection: Error | undefined;
  try {
    await client.query("BEGIN");
    await client.query(`SELECT pg_advisory_xact_lock($1)`, [NUMEROTATION_LOCK_KEY]);

    const clientRes = await client.query<{ id: number }>(`SELECT id FROM clients WHERE id = $1`, [input.client_id]);
    if (!clientRes.rows[0]) {
      throw new HttpError(404, "CLIENT_NOT_FOUND", "Client introuvable");
    }

    const year = opts.now.getFullYear();
    const stateRes = await client.query<{ total: number; max_sequence: number }>(
      `
      SELECT
        COUNT(*)::int AS total,
        COALESCE(MAX(CASE WHEN numero ~ $1 THEN split_part(numero, '-', 2)::int END), 0)::int AS max_sequence
      FROM facture
      `,
      [`^F${year}-[0-9]+$`]
    );
    const state = stateRes.rows[0] ?? { total: 0, max_sequence: 0 };
    const numero = nextNumeroFacture(opts.mode, year, {
      total: state.total,
      maxSequenceAnnee: state.max_sequence,
    });

    const totals = computeDocumentTotals(input.lignes, input.tva_pourcent);

    const ins = await client.query<{ id: number }>(
      `
      INSERT INTO facture (
        numero,
        client_id,
        date_emission,
        total_ht,
        tva_pourcent,
        montant_tva,
        total_ttc,
        notes
      ) VALUES ($1,$2,$3::date,$4,$5,$6,$7,$8)
      RETURNING id
      `,
      [
        numero,
        input.client_id,
        toIsoDate(opts.now),
        totals.total_ht,
        input.tva_pourcent,
        totals.montant_tva,
        totals.total_ttc,
        input.notes,
      ]
    );
    const factureId = ins.rows[0]?.id;
    if (factureId === undefined) throw new Error("Failed to insert facture");

    await insertFactureLines(client, factureId, input.lignes);

    await client.query("COMMIT");
    return { id: factureId, numero };
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      brokenConnection = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      logger.error("ROLLBACK impossible, connexion écartée :", brokenConnection.message);
    }
    if (isUniqueViolation(err, "facture_numero_key")) {
      throw new HttpError(409, "FACTURE_NUMERO_EXISTS", "Numero already exists");
    }
    throw err;
  } finally {
    client.release(brokenConnection);
  }
}

export async function repoGetFactureStatut(id: number): Promise<StatutFacture | null> {
  const res = await pool.query<{ statut: StatutFacture }>(`SELECT statut FROM facture WHERE id = $1`, [id]);
  return res.rows[0]?.statut ?? null;
}

export async function repoUpdateFactureStatut(id: number, statut: StatutFacture): Promise<boolean> {
  const { rowCount } = await pool.query(`UPDATE facture SET statut = $2 WHERE id = $1`, [id, statut]);
  return (rowCount ?? 0) > 0;
}
