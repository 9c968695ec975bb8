// backend/services/shared/src/problem/createProblemMiddleware.ts
/**
 * Purpose:
 * - Express-only final error funnel and 404 fallback.
 * - Routing errors map to their status hint (NoRouteMatches → 404,
 *   MissingArgument / InvalidPathArgument → 400).
 * - A handler error carrying an integer 4xx `status` (e.g. a repo's
 *   "not found") answers with that status and its own message.
 * - Anything else (handler failures, template errors) → logged + generic 500.
 *
 * Invariants:
 * - Express import allowed here (adapter).
 * - Handler error details never leak into a 500 body.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import type { IBoundLogger } from "../logger/Logger";
import { isRoutingError } from "../routing/errors";
import { ProblemFactory } from "./problem";

const PROBLEM_CONTENT_TYPE = "application/problem+json";

function requestIdOf(req: { id?: unknown }): string | undefined {
  return req.id == null ? undefined : String(req.id);
}

/** 4xx hint on a non-routing error, if it carries one. */
export function clientStatusOf(err: unknown): number | undefined {
  if (!(err instanceof Error) || !("status" in err)) return undefined;
  const status = err.status;
  return typeof status === "number" &&
    Number.isInteger(status) &&
    status >= 400 &&
    status < 500
    ? status
    : undefined;
}

function codeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

export function createProblemMiddleware(opts: {
  log: IBoundLogger;
  service: string;
}): ErrorRequestHandler {
  const { log, service } = opts;
  const pf = new ProblemFactory({ service });

  return (err, req, res, next) => {
    if (res.headersSent) return next(err);
    const instance = requestIdOf(req);

    if (isRoutingError(err)) {
      const problem = pf.fromRoutingError(err, instance);
      const meta = { code: err.code, status: problem.status, path: req.originalUrl };
      if (problem.status >= 500) log.error(meta, "routing_error");
      else log.warn(meta, "routing_error");
      return res.status(problem.status).type(PROBLEM_CONTENT_TYPE).json(problem);
    }

    const status = clientStatusOf(err);
    if (status !== undefined && err instanceof Error) {
      log.warn({ status, path: req.originalUrl, error: err.name }, "handler_client_error");
      return res
        .status(status)
        .type(PROBLEM_CONTENT_TYPE)
        .json(pf.clientError(status, err.message, codeOf(err), instance));
    }

    log.error(
      {
        path: req.originalUrl,
        method: req.method,
        error: log.serializeError(err),
      },
      "unhandled error in request pipeline"
    );
    return res
      .status(500)
      .type(PROBLEM_CONTENT_TYPE)
      .json(pf.internalError(undefined, instance));
  };
}

export function createNotFoundMiddleware(opts: {
  service: string;
}): RequestHandler {
  const pf = new ProblemFactory({ service: opts.service });
  return (req, res) => {
    res
      .status(404)
      .type(PROBLEM_CONTENT_TYPE)
      .json(pf.notFound("Route not found", requestIdOf(req)));
  };
}
