// backend/services/shared/src/base/ServiceBase.ts
/**
 * Common root for the routing runtime (App, Router, Route, template engine).
 * Each instance owns one logger bound to { service, component, ...context };
 * `component` is the concrete class name.
 *
 * The service name falls back to SERVICE_NAME, then "unknown", so components
 * built in tests still log under a stable name.
 */

import { getLogger, type IBoundLogger } from "../logger/Logger";

type LogContext = Record<string, unknown>;

export interface ServiceBaseOptions {
  service?: string;
  context?: LogContext;
}

export abstract class ServiceBase {
  protected readonly service: string;
  protected readonly log: IBoundLogger;

  constructor(opts: ServiceBaseOptions = {}) {
    this.service = opts.service?.trim() || process.env.SERVICE_NAME?.trim() || "unknown";
    this.log = getLogger().bind({
      service: this.service,
      component: new.target.name,
      ...opts.context,
    });
  }

  /** Per-call logger carrying extra request-scoped fields. */
  protected bindLog(ctx: LogContext): IBoundLogger {
    return this.log.bind(ctx);
  }
}
