import { describe, it, expect, vi } from "vitest";
import { HttpError } from "../utils/httpError";
import {
  DraftStore,
  svcAbandonBrouillon,
  svcAddLigne,
  svcCommitBrouillon,
  svcCreateBrouillon,
  svcGetBrouillon,
} from "../module/brouillon/services/brouillons.service";
import type { CommitFactureInput, CommitFactureResult } from "../module/facturation/types/factures.types";

const carrelage = { description: "Carrelage", type_facturation: "m²", quantite: 10, prix_unitaire: 25 };
const pose = { description: "Pose", type_facturation: "forfait", quantite: 2, prix_unitaire: 100 };

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function draftWithTwoLines() {
  const store = new DraftStore();
  const { session_id } = svcCreateBrouillon(store);
  svcAddLigne(session_id, carrelage, store);
  svcAddLigne(session_id, pose, store);
  return { store, session_id };
}

describe("DraftStore", () => {
  it("crée un brouillon vide par session", () => {
    const store = new DraftStore();
    const a = svcCreateBrouillon(store);
    const b = svcCreateBrouillon(store);

    expect(a.session_id).not.toBe(b.session_id);
    expect(store.size).toBe(2);
    expect(svcGetBrouillon(a.session_id, 20, store)).toMatchObject({
      session_id: a.session_id,
      tva_pourcent: 20,
      lignes: [],
      totaux: { total_ht: 0, montant_tva: 0, total_ttc: 0 },
    });
  });

  it("session inconnue => 404 BROUILLON_NOT_FOUND", () => {
    const store = new DraftStore();
    const err = catchError(() => store.get("5b2f8c1e-0000-4000-8000-000000000000"));
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: 404, code: "BROUILLON_NOT_FOUND" });
  });

  it("ligne invalide => 400 avec le détail des champs", () => {
    const { store, session_id } = draftWithTwoLines();
    const err = catchError(() => svcAddLigne(session_id, { ...pose, description: "" }, store));

    expect(err).toMatchObject({
      status: 400,
      code: "VALIDATION_ERROR",
      details: { fieldErrors: { description: ["Description obligatoire"] } },
    });
    expect(store.get(session_id).size).toBe(2);
  });

  it("abandon : la session disparaît", () => {
    const store = new DraftStore();
    const { session_id } = svcCreateBrouillon(store);

    svcAbandonBrouillon(session_id, store);

    expect(store.size).toBe(0);
    expect(catchError(() => svcAbandonBrouillon(session_id, store))).toMatchObject({ status: 404 });
  });
});

describe("DraftStore : éviction", () => {
  const MINUTE = 60_000;

  function storeWithClock(opts: { ttlMs?: number; maxDrafts?: number } = {}) {
    let now = 1_000_000;
    const store = new DraftStore({ ttlMs: 30 * MINUTE, maxDrafts: 100, ...opts, clock: () => now });
    return { store, advance: (ms: number) => (now += ms) };
  }

  it("un brouillon inactif au-delà du délai est écarté", () => {
    const { store, advance } = storeWithClock();
    const { session_id: ancien } = svcCreateBrouillon(store);
    const { session_id: actif } = svcCreateBrouillon(store);

    advance(20 * MINUTE);
    svcAddLigne(actif, pose, store);
    advance(20 * MINUTE);

    expect(catchError(() => store.get(ancien))).toMatchObject({ status: 404, code: "BROUILLON_NOT_FOUND" });
    expect(store.get(actif).size).toBe(1);
  });

  it("create purge les sessions expirées", () => {
    const { store, advance } = storeWithClock();
    for (let i = 0; i < 50; i += 1) svcCreateBrouillon(store);
    expect(store.size).toBe(50);

    advance(31 * MINUTE);
    svcCreateBrouillon(store);

    expect(store.size).toBe(1);
  });

  it("au-delà de la limite, la session la moins récemment utilisée part", () => {
    const { store, advance } = storeWithClock({ maxDrafts: 3 });
    const a = svcCreateBrouillon(store).session_id;
    advance(1);
    const b = svcCreateBrouillon(store).session_id;
    advance(1);
    const c = svcCreateBrouillon(store).session_id;
    advance(1);
    store.get(a);
    advance(1);

    const d = svcCreateBrouillon(store).session_id;

    expect(store.size).toBe(3);
    expect(catchError(() => store.get(b))).toMatchObject({ status: 404 });
    expect(store.get(a).sessionId).toBe(a);
    expect(store.get(c).sessionId).toBe(c);
    expect(store.get(d).sessionId).toBe(d);
  });

  it("une session en cours d'enregistrement n'est pas évincée", async () => {
    const { store, advance } = storeWithClock({ maxDrafts: 1 });
    const { session_id } = svcCreateBrouillon(store);
    svcAddLigne(session_id, pose, store);

    let release: (value: CommitFactureResult) => void = () => {};
    const commit = vi.fn(
      () =>
        new Promise<CommitFactureResult>((resolve) => {
          release = resolve;
        })
    );
    const pending = svcCommitBrouillon(session_id, { client_id: 3, tva_pourcent: 20 }, store, commit);

    advance(31 * MINUTE);
    svcCreateBrouillon(store);
    expect(store.size).toBe(2);

    release({ id: 1, numero: "F2026-0001" });
    await expect(pending).resolves.toEqual({ id: 1, numero: "F2026-0001" });
    expect(store.size).toBe(1);
  });
});

describe("svcCommitBrouillon", () => {
  it("succès : transmet les lignes dans l'ordre puis ferme la session", async () => {
    const { store, session_id } = draftWithTwoLines();
    const commit = vi.fn(async (_input: CommitFactureInput): Promise<CommitFactureResult> => ({ id: 11, numero: "F2026-0001" }));

    const out = await svcCommitBrouillon(session_id, { client_id: 3, tva_pourcent: 20 }, store, commit);

    expect(out).toEqual({ id: 11, numero: "F2026-0001" });
    expect(commit).toHaveBeenCalledWith({
      client_id: 3,
      tva_pourcent: 20,
      notes: null,
      lignes: [
        { description: "Carrelage", type_facturation: "m²", quantite: 10, prix_unitaire: 25, total: 250 },
        { description: "Pose", type_facturation: "forfait", quantite: 2, prix_unitaire: 100, total: 200 },
      ],
    });
    expect(store.size).toBe(0);
    expect(catchError(() => store.get(session_id))).toMatchObject({ status: 404, code: "BROUILLON_NOT_FOUND" });
  });

  it("échec : le brouillon est conservé pour réessayer", async () => {
    const { store, session_id } = draftWithTwoLines();
    const commit = vi.fn(async (): Promise<CommitFactureResult> => {
      throw new HttpError(404, "CLIENT_NOT_FOUND", "Client introuvable");
    });

    await expect(
      svcCommitBrouillon(session_id, { client_id: 99, tva_pourcent: 20 }, store, commit)
    ).rejects.toMatchObject({ status: 404, code: "CLIENT_NOT_FOUND" });

    expect(store.get(session_id).size).toBe(2);
    expect(svcAddLigne(session_id, pose, store).count).toBe(3);
  });

  it("brouillon vide => 400 sans appel à la base", async () => {
    const store = new DraftStore();
    const { session_id } = svcCreateBrouillon(store);
    const commit = vi.fn(async (): Promise<CommitFactureResult> => ({ id: 1, numero: "F2026-0001" }));

    await expect(
      svcCommitBrouillon(session_id, { client_id: 3, tva_pourcent: 20 }, store, commit)
    ).rejects.toMatchObject({ status: 400, code: "VALIDATION_ERROR" });
    expect(commit).not.toHaveBeenCalled();
  });

  it("pendant l'enregistrement, le brouillon est verrouillé", async () => {
    const { store, session_id } = draftWithTwoLines();

    let release: (value: CommitFactureResult) => void = () => {};
    const pending = new Promise<CommitFactureResult>((resolve) => {
      release = resolve;
    });
    const commit = vi.fn(() => pending);

    const first = svcCommitBrouillon(session_id, { client_id: 3, tva_pourcent: 20 }, store, commit);

    expect(catchError(() => svcAddLigne(session_id, carrelage, store))).toMatchObject({
      status: 409,
      code: "BROUILLON_EN_COURS",
    });
    await expect(
      svcCommitBrouillon(session_id, { client_id: 3, tva_pourcent: 20 }, store, commit)
    ).rejects.toMatchObject({ status: 409, code: "BROUILLON_EN_COURS" });

    release({ id: 12, numero: "F2026-0002" });
    await expect(first).resolves.toEqual({ id: 12, numero: "F2026-0002" });

    expect(commit).toHaveBeenCalledTimes(1);
    expect(catchError(() => svcAddLigne(session_id, carrelage, store))).toMatchObject({ status: 404 });
  });
});
