import type { Request, Response, NextFunction } from "express";
import { sendError } from "../utils/response";

export const validateContentType = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (req.method === "POST" || req.method === "PUT") {
    if (!req.is("application/json")) {
      sendError(res, "Content-Type must be application/json", 415);
      return;
    }
  }
  next();
};
