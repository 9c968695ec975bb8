// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Structured request telemetry via pino-http, one line per request.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health and favicon requests are not logged.
 * - An inbound x-request-id / x-correlation-id is reused; otherwise a UUID
 *   is minted. The id is always echoed as x-request-id.
 */

import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import pinoHttp from "pino-http";
import { rootPino } from "../logger/Logger";

const QUIET_PATHS = new Set([
  "/health",
  "/health/live",
  "/health/ready",
  "/favicon.ico",
]);

function headerValue(v: string | string[] | undefined): string | undefined {
  const first = Array.isArray(v) ? v[0] : v;
  return first && first.trim() ? first.trim() : undefined;
}

export function makeHttpLogger(serviceName: string) {
  const logger = rootPino().child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id =
        headerValue(req.headers["x-request-id"]) ??
        headerValue(req.headers["x-correlation-id"]) ??
        randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (_req, res, err) => {
      if (err) return "error";
      if (res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: { id?: unknown; method?: string; url?: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode?: number }) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
