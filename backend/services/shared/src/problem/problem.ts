// backend/services/shared/src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC7807-ish).
 * - Single source of truth for the ProblemJson wire shape and the
 *   ProblemFactory helpers used by the Express funnel.
 *
 * Invariants:
 * - No Express/HTTP framework imports.
 * - No process.env access.
 */

import { z } from "zod";
import type { RoutingError } from "../routing/errors";

export const zProblem = z.object({
  type: z.string(),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  code: z.string().optional(),
  instance: z.string().optional(),
  service: z.string().optional(),
});

export type ProblemJson = z.infer<typeof zProblem>;

const TITLES: Record<number, string> = {
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  409: "Conflict",
  422: "Unprocessable Entity",
  500: "Internal Server Error",
};

function titleFor(status: number): string {
  return TITLES[status] ?? "Request Failed";
}

export class ProblemFactory {
  private readonly service: string;

  public constructor(opts: { service: string }) {
    if (!opts?.service?.trim()) {
      throw new Error(
        "PROBLEM_FACTORY_INVALID: service is required. Ops: pass a valid service name."
      );
    }
    this.service = opts.service.trim();
  }

  private base(p: Omit<ProblemJson, "service">): ProblemJson {
    return { ...p, service: this.service };
  }

  public fromRoutingError(err: RoutingError, instance?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: titleFor(err.status),
      status: err.status,
      code: err.code,
      detail: err.message,
      instance,
    });
  }

  /** A handler failure that carries its own 4xx status. */
  public clientError(
    status: number,
    detail: string,
    code?: string,
    instance?: string
  ): ProblemJson {
    return this.base({
      type: "about:blank",
      title: titleFor(status),
      status,
      code: code ?? "CLIENT_ERROR",
      detail,
      instance,
    });
  }

  public notFound(detail: string, instance?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      code: "NOT_FOUND",
      detail,
      instance,
    });
  }

  public internalError(detail?: string, instance?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "INTERNAL_ERROR",
      detail: detail ?? "An unexpected error occurred.",
      instance,
    });
  }
}
