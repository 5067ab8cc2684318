import type { Response } from "express";
import type { ErrorResponse } from "../types/response/service.response";

export const sendSuccess = <T>(res: Response, data: T, status = 200) =>
  res.status(status).json(data);

export const sendError = (
  res: Response,
  detail: ErrorResponse["detail"],
  status = 500
) => {
  const payload: ErrorResponse = { detail };
  return res.status(status).json(payload);
};
