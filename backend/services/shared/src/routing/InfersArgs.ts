// backend/services/shared/src/routing/InfersArgs.ts
/**
 * Purpose:
 * - Build the positional argument list for a handler from its declared
 *   parameter names.
 *
 * Lookup:
 * - path-derived args (integers), plus one synthetic entry `params` holding
 *   the whole raw request parameter map. `params` wins on a name clash.
 * - Individual query/body keys are not bound by name; declare `params`.
 *
 * Invariants:
 * - Every declared parameter is required. Absent → MissingArgument.
 * - Variadic handlers always receive [].
 */

import type { HandlerDescriptor } from "./handlers";
import type { PathArgs } from "./RoutePath";
import type { RequestParams } from "./types";
import { MissingArgument } from "./errors";

export const PARAMS_ARG = "params";

export class InfersArgs {
  public static for(
    handlerName: string,
    descriptor: HandlerDescriptor,
    pathArgs: PathArgs,
    requestParams: RequestParams
  ): unknown[] {
    if (descriptor.params.kind === "variadic") return [];

    const lookup = new Map<string, unknown>(Object.entries(pathArgs));
    lookup.set(PARAMS_ARG, requestParams);

    return descriptor.params.names.map((name) => {
      if (!lookup.has(name)) throw new MissingArgument(name, handlerName);
      return lookup.get(name);
    });
  }
}
