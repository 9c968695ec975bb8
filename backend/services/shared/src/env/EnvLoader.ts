// backend/services/shared/src/env/EnvLoader.ts
/**
 * Purpose:
 * - Deterministic env loading for the repo.
 *
 * Load order & precedence:
 *   1) REPO ROOT: .env, .env.<mode>         (base)
 *   2) SERVICE-LOCAL: .env, .env.<mode>     (OVERRIDES root)
 *   3) ENV_FILE (if provided)               (OVERRIDES root & service)
 *
 * Keys already present in the real environment before loading are never
 * overwritten.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export type EnvMode = "dev" | "test" | "production" | (string & {});

export type ApplyStats = {
  file: string;
  newKeys: number;
  overrides: number;
  totalKeys: number;
};

/** Uppercase-with-underscores guard; we don't set weird keys. */
const VALID_KEY = /^[A-Z0-9_]+$/;

function safeRead(file: string): Record<string, string> {
  if (!fs.existsSync(file)) return {};
  return dotenv.parse(fs.readFileSync(file, "utf8"));
}

export class EnvLoader {
  /** Nearest ancestor holding a package.json, else the start directory. */
  static findRepoRoot(startDir: string = process.cwd()): string {
    let dir = path.resolve(startDir);
    while (true) {
      if (fs.existsSync(path.join(dir, "package.json"))) return dir;
      const parent = path.dirname(dir);
      if (parent === dir) return path.resolve(startDir);
      dir = parent;
    }
  }

  static loadAll(options?: {
    mode?: EnvMode;
    repoRoot?: string;
    serviceDir?: string;
    env?: NodeJS.ProcessEnv;
  }): ApplyStats[] {
    const env = options?.env ?? process.env;
    const repoRoot = options?.repoRoot ?? this.findRepoRoot();
    const serviceDir = options?.serviceDir ?? process.cwd();
    const mode = (env.MODE ?? env.NODE_ENV ?? options?.mode ?? "dev")
      .toString()
      .toLowerCase();

    const groups: Array<{ files: string[]; override: boolean }> = [
      {
        files: [path.join(repoRoot, ".env"), path.join(repoRoot, `.env.${mode}`)],
        override: false,
      },
      {
        files: [
          path.join(serviceDir, ".env"),
          path.join(serviceDir, `.env.${mode}`),
        ],
        override: true,
      },
    ];
    if (env.ENV_FILE) {
      const explicit = path.isAbsolute(env.ENV_FILE)
        ? env.ENV_FILE
        : path.join(repoRoot, env.ENV_FILE);
      if (!fs.existsSync(explicit)) {
        throw new Error(`ENV: ENV_FILE not found at: ${explicit}`);
      }
      groups.push({ files: [explicit], override: true });
    }

    // Snapshot so file layers may override each other but never the shell.
    const preset = new Set(Object.keys(env));
    const seen = new Set<string>();
    const stats: ApplyStats[] = [];

    for (const group of groups) {
      for (const f of group.files) {
        const abs = path.resolve(f);
        if (seen.has(abs) || !fs.existsSync(abs)) continue;
        seen.add(abs);
        stats.push(applyEnvFromFile(env, abs, group.override, preset));
      }
    }
    return stats;
  }
}

function applyEnvFromFile(
  env: NodeJS.ProcessEnv,
  file: string,
  override: boolean,
  preset: Set<string>
): ApplyStats {
  const kv = safeRead(file);
  let newKeys = 0;
  let overrides = 0;
  for (const [k, v] of Object.entries(kv)) {
    if (!VALID_KEY.test(k) || preset.has(k)) continue;
    if (env[k] === undefined) {
      env[k] = v;
      newKeys++;
    } else if (override && env[k] !== v) {
      env[k] = v;
      overrides++;
    }
  }
  return { file, newKeys, overrides, totalKeys: Object.keys(kv).length };
}
