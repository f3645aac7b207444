import { NextFunction, Request, RequestHandler, Response } from "express";
import { ErrorResponse } from "@rps-arena/core";
import { ErrorCategory, isMatchEngineError } from "@rps-arena/engine";
import log from "../logger";

/** A request rejected before it reaches the engine. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly code = "BadRequest"
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  validation: 400,
  authorization: 403,
  not_found: 404,
  state: 409,
  temporal: 409,
  settlement: 502,
};

export function statusForCategory(category: ErrorCategory): number {
  return STATUS_BY_CATEGORY[category];
}

/** Forward rejections of an async handler to the error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  let status: number;
  let body: ErrorResponse;

  if (isMatchEngineError(err)) {
    status = statusForCategory(err.category);
    body = { error: err.message, code: err.code };
    log.info({ code: err.code, matchId: err.matchId, path: req.path }, "Engine rejected request");
  } else if (err instanceof HttpError) {
    status = err.status;
    body = { error: err.message, code: err.code };
  } else if (err instanceof SyntaxError) {
    // malformed JSON from express.json()
    status = 400;
    body = { error: "Malformed JSON body", code: "BadRequest" };
  } else {
    log.error({ err, path: req.path }, "Unhandled request error");
    status = 500;
    body = { error: "Internal server error", code: "Internal" };
  }

  res.status(status).json(body);
}
