// backend/services/shared/src/routing/Router.ts
/**
 * Purpose:
 * - Ordered routes for one resource. First structural match wins; there is
 *   no specificity scoring.
 *
 * Notes:
 * - Built by the route-table builder (routes.ts); read-only afterwards.
 */

import { ServiceBase } from "../base/ServiceBase";
import { NoRouteMatches } from "./errors";
import type { Resource } from "./Resource";
import type { Route } from "./Route";
import type { Callable, ResourceRequest } from "./types";

export class Router extends ServiceBase implements Callable {
  public readonly resource: Resource;
  readonly #routes: readonly Route[];

  constructor(resource: Resource, routes: readonly Route[], service?: string) {
    super({ service, context: { resource: resource.resourceName } });
    this.resource = resource;
    this.#routes = Object.freeze([...routes]);
  }

  public get routes(): readonly Route[] {
    return this.#routes;
  }

  public matches(path: string): boolean {
    return this.#routes.some((r) => r.matches(path));
  }

  public routeForPath(path: string): Route {
    const found = this.#routes.find((r) => r.matches(path));
    if (!found) throw new NoRouteMatches(path);
    return found;
  }

  public async call(request: ResourceRequest): Promise<string> {
    const route = this.routeForPath(request.path);
    this.log.debug(
      { path: request.path, route: route.path.template, kind: route.kind },
      "route_selected"
    );
    return route.call(request);
  }
}
