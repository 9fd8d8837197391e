import { Request, Response, NextFunction, RequestHandler } from "express";
import { z } from "zod";
import { getLogger } from "@utils/logger";

const logger = getLogger("ValidationMiddleware");

type IssueDetail = { field: string; message: string };

/**
 * 400 body for a rejected score, recommendation or event request
 */
type ValidationFailure = {
  success: false;
  error: {
    code: "VALIDATION_ERROR";
    message: string;
    details: IssueDetail[];
  };
};

const describeIssue = (issue: z.ZodIssue): IssueDetail => ({
  field: issue.path.join(".") || "body",
  message: issue.message,
});

function toValidationFailure(error: z.ZodError): ValidationFailure {
  const details = error.issues.map(describeIssue);
  const [first] = error.issues;
  // the headline names the first offending field, e.g. "scans.0.bssid: ..."
  const path = first.path.join(".");

  return {
    success: false,
    error: {
      code: "VALIDATION_ERROR",
      message: path ? `${path}: ${first.message}` : first.message,
      details,
    },
  };
}

/**
 * Parse `req.body` with `schema` before the controller runs. On success the
 * body is replaced by the parsed value, so zod defaults such as
 * `requireTrusted: false` reach the controller.
 *
 * @example
 * app.post(`${api}/events`, validateBody(radioEventSchema), handler);
 */
export function validateBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const parsed = schema.safeParse(req.body);
    if (parsed.success) {
      req.body = parsed.data;
      next();
      return;
    }

    logger.debug(
      `Rejected ${req.method} ${req.path}: ${parsed.error.issues.length} issue(s)`,
    );
    res.status(400).json(toValidationFailure(parsed.error));
  };
}
