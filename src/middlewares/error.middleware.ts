import type { Request, Response, NextFunction } from "express";
import { AppError } from "../common/errors";
import { logger } from "../utils/logger";
import { sendError } from "../utils/response";

type HttpError = Error & { status?: number; statusCode?: number };

const statusOf = (err: HttpError): number => {
  if (err instanceof AppError) return err.status;
  return err.status ?? err.statusCode ?? 500;
};

export function notFoundMiddleware(_req: Request, res: Response) {
  sendError(res, "Not Found", 404);
}

// Express only treats 4-arity functions as error handlers
export function errorMiddleware(
  err: HttpError,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  const status = statusOf(err);
  if (status >= 500) {
    logger.error("Unhandled error", err);
  } else {
    logger.warn(`Request rejected: ${err.message}`);
  }
  sendError(res, err.message || "Internal Server Error", status);
}
