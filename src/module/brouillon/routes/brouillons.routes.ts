import { Router } from "express";
import {
  abandonBrouillon,
  addLigne,
  clearLignes,
  commitBrouillon,
  createBrouillon,
  getBrouillon,
  getTotaux,
} from "../controllers/brouillons.controller";

const router = Router();

router.post("/", createBrouillon);
router.get("/:sessionId", getBrouillon);
router.delete("/:sessionId", abandonBrouillon);
router.post("/:sessionId/lignes", addLigne);
router.delete("/:sessionId/lignes", clearLignes);
router.get("/:sessionId/totaux", getTotaux);
router.post("/:sessionId/commit", commitBrouillon);

export default router;
