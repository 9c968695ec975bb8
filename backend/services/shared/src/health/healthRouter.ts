// backend/services/shared/src/health/healthRouter.ts
/**
 * Purpose:
 * - Health endpoints as an Express Router.
 * - Returns the envelope:
 *     { ok:true, service, data:{ status:"live|ready|not_ready", detail?:{...} } }
 *
 * Routes (relative to wherever the router is mounted):
 *   GET <base>/health
 *   GET <base>/health/live
 *   GET <base>/health/ready
 */

import express, { type NextFunction, type Request, type Response, type Router } from "express";
import os from "node:os";
import { getLogger } from "../logger/Logger";

export interface HealthOptions {
  service: string;
  /** /health/ready answers 503 until this resolves truthy. */
  readyCheck?: () => Promise<boolean> | boolean;
}

export function createHealthRouter(opts: HealthOptions): Router {
  const { service, readyCheck } = opts;
  const log = getLogger().bind({ service, component: "createHealthRouter" });
  const target = express.Router();

  const live = (_req: Request, res: Response) => {
    res.status(200).json({
      ok: true,
      service,
      data: {
        status: "live",
        detail: {
          uptime: Math.floor(process.uptime()),
          host: os.hostname(),
          pid: process.pid,
        },
      },
    });
  };

  target.get("/health", live);
  target.get("/health/live", live);

  target.get("/health/ready", (_req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(readyCheck ? readyCheck() : true)
      .then((ready) => {
        if (!ready) log.warn({ route: "ready" }, "health/ready not ready");
        res
          .status(ready ? 200 : 503)
          .json({ ok: ready, service, data: { status: ready ? "ready" : "not_ready" } });
      })
      .catch(next);
  });

  return target;
}
