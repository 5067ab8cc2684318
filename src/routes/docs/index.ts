import express from "express";
import swaggerUi from "swagger-ui-express";
import { buildOpenApiDocument } from "../../utils/openapi";

export const createDocsRouter = () => {
  const router = express.Router();
  const document = buildOpenApiDocument();

  router.get("/openapi.json", (_req, res) => {
    res.json(document);
  });
  router.use("/docs", swaggerUi.serve, swaggerUi.setup(document));

  return router;
};
