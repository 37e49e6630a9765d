import express from "express";
import request from "supertest";
import { z } from "zod";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { errorHandler } from "../middlewares/errorHandler";
import { HttpError } from "../utils/httpError";

function appThrowing(err: unknown) {
  const app = express();
  app.get("/boom", (_req, _res, next) => next(err));
  app.use(errorHandler);
  return app;
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("errorHandler", () => {
  it("HttpError : statut et code conservés", async () => {
    const res = await request(appThrowing(new HttpError(409, "CLIENT_HAS_FACTURES", "Client référencé", { factures: 2 }))).get("/boom");

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: "CLIENT_HAS_FACTURES", message: "Client référencé", details: { factures: 2 } });
  });

  it("HttpError sans détails : pas de clé details", async () => {
    const res = await request(appThrowing(new HttpError(404, "FACTURE_NOT_FOUND", "Facture introuvable"))).get("/boom");

    expect(res.body).toEqual({ error: "FACTURE_NOT_FOUND", message: "Facture introuvable" });
  });

  it("ZodError => 400 VALIDATION_ERROR", async () => {
    const parsed = z.object({ nom: z.string().min(1, "Le nom est obligatoire") }).safeParse({ nom: "" });
    const err = parsed.success ? null : parsed.error;

    const res = await request(appThrowing(err)).get("/boom");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("VALIDATION_ERROR");
    expect(res.body.details).toEqual({ formErrors: [], fieldErrors: { nom: ["Le nom est obligatoire"] } });
  });

  it("délai PostgreSQL dépassé => 504 TIMEOUT", async () => {
    const err = Object.assign(new Error("canceling statement due to statement timeout"), { code: "57014" });

    const res = await request(appThrowing(err)).get("/boom");

    expect(res.status).toBe(504);
    expect(res.body.error).toBe("TIMEOUT");
  });

  it("base injoignable => 503 PERSISTENCE_ERROR", async () => {
    const err = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:5432"), { code: "ECONNREFUSED" });

    const res = await request(appThrowing(err)).get("/boom");

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ error: "PERSISTENCE_ERROR", message: "Base de données indisponible" });
  });

  it("connexion coupée (classe 08) => 503", async () => {
    const res = await request(appThrowing(Object.assign(new Error("lost"), { code: "08006" }))).get("/boom");

    expect(res.status).toBe(503);
  });

  it("erreur inattendue => 500 INTERNAL_ERROR sans fuite du message", async () => {
    const res = await request(appThrowing(new Error("secret interne"))).get("/boom");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "INTERNAL_ERROR", message: "Erreur interne du serveur" });
  });
});
