// backend/services/blog/src/bootstrap.ts
import {
  EnvLoader,
  initLogger,
  type ServiceConfig,
} from "../../shared/src";
import { SERVICE_ROOT, loadConfig } from "./config";

/**
 * Root env first, then service overrides, then ENV_FILE. Validates the
 * result and points the shared logger at this service.
 */
export function bootstrap(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  EnvLoader.loadAll({
    repoRoot: EnvLoader.findRepoRoot(SERVICE_ROOT),
    serviceDir: SERVICE_ROOT,
    env,
  });
  const config = loadConfig(env);
  initLogger({ service: config.serviceName, level: config.logLevel });
  return config;
}
