// backend/services/blog/src/config.ts
import path from "node:path";
import { parseServiceConfig, type ServiceConfig } from "../../shared/src";

/** Service root (the directory holding .env.dev and views/). */
export const SERVICE_ROOT = path.resolve(__dirname, "..");

/**
 * Canonical config. No dotenv here: bootstrap.ts loads the env files
 * before this is called. A relative VIEWS_DIR is taken from the service root.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const config = parseServiceConfig(env);
  return {
    ...config,
    viewsDir: path.resolve(SERVICE_ROOT, config.viewsDir),
  };
}
