// backend/services/shared/src/contracts/serviceConfig.contract.ts
/**
 * Purpose:
 * - Typed, validated service configuration read from the environment.
 *
 * Invariants:
 * - No silent defaults for identity or port; LOG_LEVEL must be a pino level.
 * - Every offending key is reported in one error, not the first only.
 */

import { z } from "zod";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "../logger/Logger";

const zLogLevel = z
  .string()
  .trim()
  .toLowerCase()
  .refine(isLogLevel, {
    message: `must be one of ${LOG_LEVELS.join("|")}`,
  });

export const zServiceConfig = z.object({
  SERVICE_NAME: z
    .string()
    .trim()
    .regex(/^[a-z][a-z0-9-]*$/, "must be a lowercase slug"),
  PORT: z.coerce.number().int().min(0).max(65535),
  LOG_LEVEL: zLogLevel,
  VIEWS_DIR: z.string().trim().min(1),
  TEMPLATE_CACHE: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((v) => v === "true" || v === "1"),
});

export type ServiceConfigEnv = z.input<typeof zServiceConfig>;

export interface ServiceConfig {
  serviceName: string;
  port: number;
  logLevel: LogLevel;
  viewsDir: string;
  templateCache: boolean;
}

export class ServiceConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid service configuration: ${issues.join("; ")}`);
    this.name = "ServiceConfigError";
  }
}

export function parseServiceConfig(
  env: Record<string, string | undefined>
): ServiceConfig {
  const parsed = zServiceConfig.safeParse(env);
  if (!parsed.success) {
    throw new ServiceConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"} ${i.message}`)
    );
  }
  const c = parsed.data;
  return {
    serviceName: c.SERVICE_NAME,
    port: c.PORT,
    logLevel: c.LOG_LEVEL,
    viewsDir: c.VIEWS_DIR,
    templateCache: c.TEMPLATE_CACHE,
  };
}
