import express from "express";
import type { HealthResponse } from "../../types/response/service.response";

export const createHealthRouter = (apiKeyExists: boolean) => {
  const healthRouter = express.Router();

  healthRouter.get("/", (_req, res) => {
    const health: HealthResponse = { status: "healthy", api_key_exists: apiKeyExists };
    res.json(health);
  });

  return healthRouter;
};
