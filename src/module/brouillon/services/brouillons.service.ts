import crypto from "node:crypto";
import { env } from "../../../config/env";
import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { svcCommitFacture } from "../../facturation/services/factures.service";
import type { CommitFactureInput, CommitFactureResult } from "../../facturation/types/factures.types";
import { DraftInvoice } from "../lib/draft-invoice";
import type { DraftLine, DraftView } from "../types/brouillon.types";
import type { CommitBrouillonBodyDTO } from "../validators/brouillon.validators";

type CommitFn = (input: CommitFactureInput) => Promise<CommitFactureResult>;

export type DraftStoreOptions = {
  /** Un brouillon non consulté depuis ce délai est considéré abandonné. */
  ttlMs?: number;
  maxDrafts?: number;
  clock?: () => number;
};

type Entry = { draft: DraftInvoice; touchedAt: number };

/**
 * Brouillons en mémoire, indexés par identifiant de session.
 * L'ordre de la Map suit le dernier accès : la première entrée est la plus ancienne.
 */
export class DraftStore {
  private readonly drafts = new Map<string, Entry>();
  private readonly committing = new Set<string>();
  private readonly ttlMs: number;
  private readonly maxDrafts: number;
  private readonly clock: () => number;

  constructor(opts: DraftStoreOptions = {}) {
    this.ttlMs = opts.ttlMs ?? env.BROUILLON_TTL_MINUTES * 60_000;
    this.maxDrafts = opts.maxDrafts ?? env.BROUILLON_MAX;
    this.clock = opts.clock ?? Date.now;
  }

  create(): DraftInvoice {
    this.evict();
    const draft = new DraftInvoice(crypto.randomUUID(), new Date(this.clock()));
    this.drafts.set(draft.sessionId, { draft, touchedAt: this.clock() });
    return draft;
  }

  get(sessionId: string): DraftInvoice {
    const entry = this.drafts.get(sessionId);
    if (!entry || this.isExpired(sessionId, entry)) {
      if (entry) this.drafts.delete(sessionId);
      throw new HttpError(404, "BROUILLON_NOT_FOUND", "Brouillon introuvable ou abandonné");
    }
    this.drafts.delete(sessionId);
    this.drafts.set(sessionId, { draft: entry.draft, touchedAt: this.clock() });
    return entry.draft;
  }

  /** Brouillon modifiable : refusé tant qu'un enregistrement est en cours sur la session. */
  getMutable(sessionId: string): DraftInvoice {
    const draft = this.get(sessionId);
    if (this.committing.has(sessionId)) {
      throw new HttpError(409, "BROUILLON_EN_COURS", "Enregistrement du brouillon déjà en cours");
    }
    return draft;
  }

  async withCommitLock<T>(sessionId: string, fn: (draft: DraftInvoice) => Promise<T>): Promise<T> {
    const draft = this.getMutable(sessionId);
    this.committing.add(sessionId);
    try {
      return await fn(draft);
    } finally {
      this.committing.delete(sessionId);
    }
  }

  delete(sessionId: string): boolean {
    this.committing.delete(sessionId);
    return this.drafts.delete(sessionId);
  }

  get size(): number {
    return this.drafts.size;
  }

  // une session en cours d'enregistrement n'expire pas
  private isExpired(sessionId: string, entry: Entry): boolean {
    return !this.committing.has(sessionId) && this.clock() - entry.touchedAt > this.ttlMs;
  }

  /** Retire les sessions expirées puis, si la limite est atteinte, les moins récemment utilisées. */
  private evict(): void {
    let expired = 0;
    for (const [sessionId, entry] of this.drafts) {
      if (this.isExpired(sessionId, entry)) {
        this.drafts.delete(sessionId);
        expired += 1;
      }
    }

    let dropped = 0;
    for (const sessionId of this.drafts.keys()) {
      if (this.drafts.size < this.maxDrafts) break;
      if (this.committing.has(sessionId)) continue;
      this.drafts.delete(sessionId);
      dropped += 1;
    }

    if (expired + dropped > 0) {
      logger.debug(`Brouillons écartés : ${expired} expiré(s), ${dropped} au-delà de la limite`);
    }
  }
}

export const draftStore = new DraftStore();

function toView(draft: DraftInvoice, tva_pourcent: number): DraftView {
  return {
    session_id: draft.sessionId,
    created_at: draft.createdAt.toISOString(),
    tva_pourcent,
    lignes: draft.getLines(),
    totaux: draft.computeTotals(tva_pourcent),
  };
}

export function svcCreateBrouillon(store = draftStore): { session_id: string } {
  const draft = store.create();
  logger.debug(`Brouillon ouvert (${draft.sessionId})`);
  return { session_id: draft.sessionId };
}

export function svcGetBrouillon(sessionId: string, tva_pourcent: number, store = draftStore): DraftView {
  return toView(store.get(sessionId), tva_pourcent);
}

export function svcAddLigne(sessionId: string, input: unknown, store = draftStore): { ligne: DraftLine; count: number } {
  const draft = store.getMutable(sessionId);
  const result = draft.addLine(input);
  if (!result.ok) {
    throw new HttpError(400, "VALIDATION_ERROR", "Description et quantité (>0) obligatoires", {
      fieldErrors: result.issues,
    });
  }
  return { ligne: result.line, count: result.count };
}

export function svcClearLignes(sessionId: string, store = draftStore): { count: number } {
  const draft = store.getMutable(sessionId);
  draft.clear();
  return { count: draft.size };
}

export function svcTotaux(sessionId: string, tva_pourcent: number, store = draftStore) {
  return store.get(sessionId).computeTotals(tva_pourcent);
}

/**
 * En cas d'échec le brouillon reste intact pour permettre une nouvelle tentative.
 * Après succès la session est vidée puis fermée.
 */
export function svcCommitBrouillon(
  sessionId: string,
  dto: CommitBrouillonBodyDTO,
  store = draftStore,
  commit: CommitFn = (input) => svcCommitFacture(input)
): Promise<CommitFactureResult> {
  return store.withCommitLock(sessionId, async (draft) => {
    if (draft.size === 0) {
      throw new HttpError(400, "VALIDATION_ERROR", "Ajoutez au moins une ligne avant d'enregistrer la facture");
    }

    const out = await commit({
      client_id: dto.client_id,
      lignes: draft.getLines(),
      tva_pourcent: dto.tva_pourcent,
      notes: dto.notes ?? null,
    });
    draft.clear();
    store.delete(sessionId);
    return out;
  });
}

export function svcAbandonBrouillon(sessionId: string, store = draftStore): void {
  if (!store.delete(sessionId)) {
    throw new HttpError(404, "BROUILLON_NOT_FOUND", "Brouillon introuvable ou abandonné");
  }
}
