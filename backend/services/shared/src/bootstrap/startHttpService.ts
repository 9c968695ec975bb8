// backend/services/shared/src/bootstrap/startHttpService.ts
/**
 * Purpose:
 * - Bind, harden socket timeouts, log where the server landed (port 0 in
 *   tests), and shut down cleanly.
 *
 * Notes:
 * - Uses `process.once` for SIGINT/SIGTERM so repeated calls don't stack handlers.
 * - Exposes `stop()` for test harnesses and orderly shutdowns.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { IBoundLogger } from "../logger/Logger";

export interface StartHttpServiceOptions {
  app: Express;
  /** 0 picks an ephemeral port. */
  port: number;
  serviceName: string;
  log: IBoundLogger;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, serviceName, log } = opts;

  return new Promise<StartedService>((resolve, reject) => {
    const server = app.listen(port);

    server.keepAliveTimeout = 7_000;
    server.headersTimeout = 9_000;

    const stop = () =>
      new Promise<void>((done, fail) => {
        server.close((err) => (err ? fail(err) : done()));
      });

    server.once("listening", () => {
      const addr = server.address();
      const bound = addr && typeof addr === "object" ? addr.port : port;
      log.info({ service: serviceName, port: bound }, "service listening");
      resolve({ server, stop });
    });

    server.once("error", (err) => {
      log.error({ service: serviceName, error: log.serializeError(err) }, "http server error");
      reject(err);
    });

    const shutdown = (signal: string) => {
      log.info({ signal, service: serviceName }, "shutting down service");
      stop().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ error: log.serializeError(err) }, "shutdown failed");
          process.exit(1);
        }
      );
      setTimeout(() => process.exit(1), 10_000).unref();
    };

    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
  });
}
