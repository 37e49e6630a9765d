import { Router } from "express";
import {
  createFacture,
  getFacture,
  getFactureByNumero,
  getFacturePdf,
  getFactureRenderData,
  getFacturesSummary,
  listFactures,
  updateFactureStatut,
} from "../controllers/factures.controller";

const router = Router();

router.get("/", listFactures);
router.get("/summary", getFacturesSummary);
router.get("/numero/:numero", getFactureByNumero);
router.get("/:id", getFacture);
router.get("/:id/rendu", getFactureRenderData);
router.get("/:id/pdf", getFacturePdf);
router.post("/", createFacture);
router.patch("/:id/statut", updateFactureStatut);

export default router;
