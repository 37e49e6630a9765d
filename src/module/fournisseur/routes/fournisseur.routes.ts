import { Router } from "express";
import { uploadLogo } from "../../../middlewares/upload";
import { getFournisseur, putFournisseur, uploadFournisseurLogo } from "../controllers/fournisseur.controller";

const router = Router();

router.get("/", getFournisseur);
router.put("/", putFournisseur);
router.post("/logo", uploadLogo.single("logo"), uploadFournisseurLogo);

export default router;
