// backend/services/shared/src/http/dispatch.ts
/**
 * Purpose:
 * - Express adapter for the routing core: turn `req` into a ResourceRequest,
 *   dispatch, send the rendered HTML.
 *
 * Invariants:
 * - params = query merged with body; body keys win.
 * - Every failure (NoRouteMatches included) goes to next(err); the problem
 *   funnel decides the status.
 */

import type { Request, RequestHandler } from "express";
import type { Callable, RequestParams, ResourceRequest } from "../routing/types";
import { asyncHandler } from "../middleware/asyncHandler";

function isRecord(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

export function toResourceRequest(req: Request): ResourceRequest {
  const query: Record<string, unknown> = isRecord(req.query) ? req.query : {};
  const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
  const params: RequestParams = Object.freeze({ ...query, ...body });
  return { path: req.path, params };
}

export function createDispatchMiddleware(app: Callable): RequestHandler {
  return asyncHandler(async (req, res) => {
    const html = await app.call(toResourceRequest(req));
    res.status(200).type("text/html; charset=utf-8").send(html);
  });
}
