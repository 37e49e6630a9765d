import express from "express";
import swaggerUi from "swagger-ui-express";
import path from "path";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import mime from "mime-types";
import v1Router from "../routes/v1.routes";
import { errorHandler } from "../middlewares/errorHandler";
import { requestIdMiddleware } from "../middlewares/requestId";
import { requestLogger } from "../middlewares/requestLogger";
import { swaggerSpec } from "../swagger/swagger";
import { env } from "./env";

const app = express();

/* ------------------ 1) Sécurité & CORS ------------------ */

app.use(helmet());

app.use(
  cors({
    origin: "*",
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  })
);

/* ------------------ 2) Traçabilité ------------------ */

app.use(requestIdMiddleware);
if (env.NODE_ENV !== "test") {
  app.use(morgan("dev"));
  app.use(requestLogger);
}

/* --------- 3) Parsers: JSON + urlencoded (sans casser multipart) --------- */

const jsonParser = express.json({ limit: "1mb" });

app.use((req, res, next) => {
  if (req.is("application/json")) {
    return jsonParser(req, res, next);
  }
  return next();
});

app.use(express.urlencoded({ extended: true, limit: "1mb" }));

/* ------------------ 4) Swagger / Docs ------------------ */

app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerSpec));

/* ------------------ 5) Routes ------------------ */

app.get("/", (_req, res) => {
  res.send("✅ API de facturation en ligne !");
});

app.get("/api/v1", (_req, res) => {
  res.send("✅ API de facturation en ligne en V1 !");
});

app.use("/api/v1/", v1Router);

/* ------------------ 6) Logos (fichiers statiques) ------------------ */

app.use(
  "/logos",
  express.static(path.resolve(env.LOGO_DIR), {
    setHeaders: (res, filePath) => {
      const mimeType = mime.lookup(filePath);
      if (mimeType) {
        res.setHeader("Content-Type", mimeType);
      }
      res.setHeader("Cross-Origin-Resource-Policy", "cross-origin");
    },
  })
);

/* ------------------ 7) Error handler (TOUJOURS EN DERNIER) ------------------ */

app.use(errorHandler);

export default app;
