// src/module/client/routes/client.routes.ts
import { Router } from "express";
import { uploadLogo } from "../../../middlewares/upload";
import {
  deleteClient,
  getClientById,
  listClients,
  postClient,
  uploadClientLogo,
} from "../controllers/client.controller";

const router = Router();

router.post("/", postClient);
router.get("/", listClients);
router.get("/:id", getClientById);
router.delete("/:id", deleteClient);

// champ "logo" = FormData.append("logo", file)
router.post("/:id/logo", uploadLogo.single("logo"), uploadClientLogo);

export default router;
