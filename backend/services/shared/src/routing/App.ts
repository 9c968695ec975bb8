// backend/services/shared/src/routing/App.ts
/**
 * Purpose:
 * - Top-level request dispatcher: one Router per resource, tried in
 *   registration order.
 *
 * Invariants:
 * - First success short-circuits.
 * - NoRouteMatches moves on to the next router; from the last router it is
 *   re-raised as-is. No aggregated "nothing matched" error.
 * - Any other error propagates immediately.
 */

import { ServiceBase } from "../base/ServiceBase";
import { NoRouteMatches } from "./errors";
import type { Callable, ResourceRequest } from "./types";

/** A router, or a resource module exposing its router as `Routes`. */
export type Routable = Callable | { readonly Routes: Callable };

function toCallable(entry: Routable): Callable {
  return "Routes" in entry ? entry.Routes : entry;
}

export class App extends ServiceBase implements Callable {
  readonly #routers: readonly Callable[];

  constructor(resources: readonly Routable[], opts?: { service?: string }) {
    super({ service: opts?.service });
    this.#routers = Object.freeze(resources.map(toCallable));
  }

  public async call(request: ResourceRequest): Promise<string> {
    const routers = this.#routers;
    if (routers.length === 0) throw new NoRouteMatches(request.path);

    for (let i = 0; i < routers.length; i++) {
      try {
        return await routers[i].call(request);
      } catch (err) {
        if (!(err instanceof NoRouteMatches)) throw err;
        if (i === routers.length - 1) {
          this.log.debug({ path: request.path }, "no_route_matches");
          throw err;
        }
      }
    }

    // not reached: the last router either returns or throws
    throw new NoRouteMatches(request.path);
  }
}
