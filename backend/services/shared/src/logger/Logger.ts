// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API for the framework and every service built on it.
 * - pino underneath; callers only ever see IBoundLogger with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})    OR  log.info({meta}, "msg")
 *
 * Runtime Controls:
 * - initLogger({ service, level }) rebuilds the root with base.service stamped.
 * - Until initLogger() runs the root logs at "info" with no service stamp.
 *
 * Notes:
 * - debug() adds origin capture (file:line of the caller).
 * - Bound loggers resolve the root lazily, so handles created before
 *   initLogger() pick up the new root.
 */

import pino, {
  type Logger as PinoLogger,
  type LevelWithSilent,
  type LoggerOptions,
  type DestinationStream,
  stdTimeFunctions,
} from "pino";

type Json = Record<string, unknown>;

/** Public interface for bound logger handles (no private members). */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  info(msg: string, ...rest: unknown[]): void;
  info(obj: Json, msg?: string, ...rest: unknown[]): void;

  debug(msg: string, ...rest: unknown[]): void;
  debug(obj: Json, msg?: string, ...rest: unknown[]): void;

  warn(msg: string, ...rest: unknown[]): void;
  warn(obj: Json, msg?: string, ...rest: unknown[]): void;

  error(msg: string, ...rest: unknown[]): void;
  error(obj: Json, msg?: string, ...rest: unknown[]): void;

  serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  };
}

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

const LEVEL_SET: ReadonlySet<string> = new Set(LOG_LEVELS);

export function isLogLevel(v: string): v is LogLevel {
  return LEVEL_SET.has(v);
}

// ────────────────────────────────────────────────────────────────────────────
// Root logger
// ────────────────────────────────────────────────────────────────────────────

const baseOptions: LoggerOptions = {
  level: "info",
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

let ROOT: PinoLogger = pino(baseOptions);
let SERVICE_NAME = "";

/** Call once at bootstrap, before request loggers are created. */
export function initLogger(
  opts: { service: string; level?: LogLevel },
  destination?: DestinationStream
): void {
  const service = String(opts.service ?? "").trim();
  if (!service) throw new Error("initLogger requires a service name");
  SERVICE_NAME = service;
  const options: LoggerOptions = {
    ...baseOptions,
    level: opts.level ?? "info",
    base: { service },
  };
  ROOT = destination ? pino(options, destination) : pino(options);
}

export function currentServiceName(): string {
  return SERVICE_NAME || "uninitialized";
}

export function setLogLevel(level: LogLevel): void {
  if (!isLogLevel(level)) throw new Error(`Invalid LOG_LEVEL: "${level}"`);
  ROOT.level = level;
}

/** The raw pino root, for adapters (pino-http) that need the real thing. */
export function rootPino(): PinoLogger {
  return ROOT;
}

export function getLogger(initialCtx: Json = {}): IBoundLogger {
  return new BoundLogger(initialCtx);
}

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

class BoundLogger implements IBoundLogger {
  constructor(private readonly ctx: Json = {}) {}

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  public info = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2, rest);
    ROOT.info(obj, msg);
  };

  public debug = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    if (!ROOT.isLevelEnabled("debug")) return;
    const [obj0, msg] = normalizeForBound(this.ctx, arg1, arg2, rest);
    ROOT.debug({ ...obj0, origin: captureOrigin(2) }, msg);
  };

  public warn = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2, rest);
    ROOT.warn(obj, msg);
  };

  public error = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2, rest);
    ROOT.error(obj, msg);
  };

  public serializeError(err: unknown) {
    if (err instanceof Error)
      return { name: err.name, message: err.message, stack: err.stack };
    return { message: String(err) };
  }
}

function isPlainObject(x: unknown): x is Json {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/** Normalize overloaded args while merging in bound context. */
function normalizeForBound(
  boundCtx: Json,
  arg1: unknown,
  arg2?: unknown,
  rest: unknown[] = []
): [Json, string | undefined] {
  const meta: Json = {};
  let msg: string | undefined;
  const tail: unknown[] = [];

  if (typeof arg1 === "string") {
    msg = arg1;
    for (const x of [arg2, ...rest]) {
      if (isPlainObject(x)) Object.assign(meta, x);
      else if (x !== undefined) tail.push(x);
    }
  } else if (isPlainObject(arg1)) {
    Object.assign(meta, arg1);
    if (typeof arg2 === "string") msg = arg2;
    else if (isPlainObject(arg2)) Object.assign(meta, arg2);
    else if (arg2 !== undefined) tail.push(arg2);
    for (const x of rest) {
      if (isPlainObject(x)) Object.assign(meta, x);
      else if (x !== undefined) tail.push(x);
    }
  } else if (arg1 !== undefined) {
    meta.arg0 = arg1;
  }

  if (tail.length) meta.extra = tail;
  return [{ ...boundCtx, ...meta }, msg];
}

/** file:line of the caller `depth` frames above this helper. */
function captureOrigin(depth: number): string | undefined {
  const stack = new Error().stack?.split("\n") ?? [];
  const frame = stack[depth + 1];
  if (!frame) return undefined;
  const m = /\(?([^()\s]+:\d+):\d+\)?\s*$/.exec(frame.trim());
  return m?.[1];
}
