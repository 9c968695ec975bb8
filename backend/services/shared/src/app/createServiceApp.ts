// backend/services/shared/src/app/createServiceApp.ts
/**
 * Purpose:
 * - Assemble the Express stack around a resource dispatcher:
 *   http logger → health → body parsers → dispatcher → 404 → problem funnel.
 *
 * Notes:
 * - The dispatcher is mounted for every method; routing does not look at
 *   the verb.
 * - NoRouteMatches from the dispatcher reaches the problem funnel (404), so
 *   the trailing notFound only sees paths outside `mountPath`.
 */

import express, { type Express } from "express";
import { makeHttpLogger } from "../middleware/httpLogger";
import { createHealthRouter, type HealthOptions } from "../health/healthRouter";
import { createDispatchMiddleware } from "../http/dispatch";
import {
  createNotFoundMiddleware,
  createProblemMiddleware,
} from "../problem/createProblemMiddleware";
import { getLogger } from "../logger/Logger";
import type { Callable } from "../routing/types";

export type CreateServiceAppOptions = {
  serviceName: string;
  dispatcher: Callable;
  /** Where the dispatcher is mounted; defaults to "/". */
  mountPath?: string;
  readyCheck?: HealthOptions["readyCheck"];
  /** Off in tests that assert on captured log lines. */
  httpLogging?: boolean;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, dispatcher, readyCheck } = opts;
  const log = getLogger().bind({ service: serviceName, component: "createServiceApp" });

  const app = express();
  app.disable("x-powered-by");

  if (opts.httpLogging ?? true) app.use(makeHttpLogger(serviceName));

  app.use(createHealthRouter({ service: serviceName, readyCheck }));

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use(opts.mountPath ?? "/", createDispatchMiddleware(dispatcher));

  app.use(createNotFoundMiddleware({ service: serviceName }));
  app.use(createProblemMiddleware({ log, service: serviceName }));

  return app;
}
