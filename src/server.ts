import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import type { AppContext } from "./common/context";
import { errorMiddleware, notFoundMiddleware } from "./middlewares/error.middleware";
import { requestLogger } from "./middlewares/logger.middleware";
import { createRoutes } from "./routes";

export const createServer = (context: AppContext) => {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: context.config.api.cors.origin }));
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);

  app.use("/", createRoutes(context));

  app.use(notFoundMiddleware);
  // Error middleware should be last
  app.use(errorMiddleware);

  return app;
};
