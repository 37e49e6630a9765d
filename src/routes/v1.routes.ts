// src/routes/v1.routes.ts
import { Router } from "express";
import fournisseurRoutes from "../module/fournisseur/routes/fournisseur.routes";
import clientRoutes from "../module/client/routes/client.routes";
import factureRoutes from "../module/facturation/routes/factures.routes";
import brouillonRoutes from "../module/brouillon/routes/brouillons.routes";

const router = Router();

router.use("/fournisseur", fournisseurRoutes);
router.use("/clients", clientRoutes);
router.use("/factures", factureRoutes);
router.use("/brouillons", brouillonRoutes);

export default router;
