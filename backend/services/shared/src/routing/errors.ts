// backend/services/shared/src/routing/errors.ts
/**
 * Purpose:
 * - Typed failures raised by the routing core.
 * - `status` is a transport hint only; the Express problem funnel reads it,
 *   the core never does.
 *
 * Invariants:
 * - Handler failures are never wrapped in one of these.
 */

export type RoutingErrorCode =
  | "NO_ROUTE_MATCHES"
  | "MISSING_ARGUMENT"
  | "INVALID_PATH_ARGUMENT"
  | "MISSING_RESOURCE_CONVENTION"
  | "UNKNOWN_HANDLER";

export abstract class RoutingError extends Error {
  public abstract readonly code: RoutingErrorCode;
  public abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoRouteMatches extends RoutingError {
  public readonly code = "NO_ROUTE_MATCHES";
  public readonly status = 404;

  constructor(public readonly path: string) {
    super(`No route matches "${path}"`);
  }
}

export class MissingArgument extends RoutingError {
  public readonly code = "MISSING_ARGUMENT";
  public readonly status = 400;

  constructor(
    public readonly parameter: string,
    public readonly handlerName: string
  ) {
    super(
      `Handler "${handlerName}" requires "${parameter}" but the request does not provide it`
    );
  }
}

export class InvalidPathArgument extends RoutingError {
  public readonly code = "INVALID_PATH_ARGUMENT";
  public readonly status = 400;

  constructor(
    public readonly parameter: string,
    public readonly value: string
  ) {
    super(`Path argument "${parameter}" must be an integer (got: "${value}")`);
  }
}

export class MissingResourceConvention extends RoutingError {
  public readonly code = "MISSING_RESOURCE_CONVENTION";
  public readonly status = 500;

  constructor(
    public readonly resource: string,
    public readonly member: string
  ) {
    super(`Resource "${resource}" does not define ${member}`);
  }
}

export class UnknownHandler extends RoutingError {
  public readonly code = "UNKNOWN_HANDLER";
  public readonly status = 500;

  constructor(
    public readonly resource: string,
    public readonly handlerName: string
  ) {
    super(`Resource "${resource}" has no Record handler "${handlerName}"`);
  }
}

export function isRoutingError(err: unknown): err is RoutingError {
  return err instanceof RoutingError;
}
