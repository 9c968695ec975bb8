// backend/services/blog/index.ts
/**
 * Service: blog
 * Boot: env → config → logger → app → listen.
 */

import { getLogger, startHttpService } from "../shared/src";
import { bootstrap } from "./src/bootstrap";
import { buildBlogApp } from "./src/app";

async function main(): Promise<void> {
  const config = bootstrap();
  const log = getLogger().bind({ service: config.serviceName, component: "main" });

  process.on("unhandledRejection", (reason) => {
    log.error({ error: log.serializeError(reason) }, "unhandledRejection");
  });
  process.on("uncaughtException", (err) => {
    log.error({ error: log.serializeError(err) }, "uncaughtException");
    process.exit(1);
  });

  const { app } = buildBlogApp({
    serviceName: config.serviceName,
    viewsDir: config.viewsDir,
    templateCache: config.templateCache,
  });

  await startHttpService({
    app,
    port: config.port,
    serviceName: config.serviceName,
    log,
  });
}

main().catch((err: unknown) => {
  getLogger({ service: "blog" }).error(
    { error: getLogger().serializeError(err) },
    "blog failed to start"
  );
  process.exit(1);
});
