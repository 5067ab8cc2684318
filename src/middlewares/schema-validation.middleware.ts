import type { Request, Response, NextFunction } from "express";
import type { ZodIssue, ZodTypeAny } from "zod";
import type { RequestValidationDetail } from "../types/response/service.response";
import { sendError } from "../utils/response";

type Schemas = {
  body: ZodTypeAny;
};

const toDetail = (issue: ZodIssue): RequestValidationDetail => ({
  loc: ["body", ...issue.path],
  msg: issue.message,
  type: issue.code,
});

/**
 * Validate the request body and replace it with the parsed value.
 * Violations are answered with 422 and one detail entry per issue.
 */
export const validateRequest =
  (schemas: Schemas) => (req: Request, res: Response, next: NextFunction) => {
    const parsed = schemas.body.safeParse(req.body);
    if (!parsed.success) {
      return sendError(res, parsed.error.issues.map(toDetail), 422);
    }
    req.body = parsed.data;
    return next();
  };
