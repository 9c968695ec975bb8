// backend/services/shared/src/routing/routes.ts
/**
 * Route-table builder.
 *
 *   export const Routes = routes(Post, (r) => {
 *     r.new();
 *     r.show();
 *     r.index("Record.published");
 *   }, { templates });
 *
 * Conventional kinds:
 *   show  → /<name>/:id   default handler find_by_id
 *   new   → /<name>/new   default handler initialize
 *   index → /<name>       default handler all
 *
 * Declaration order is match order: declare `new` before `show`, or
 * `/<name>/new` is taken by `/<name>/:id`.
 */

import { Resource } from "./Resource";
import { Route } from "./Route";
import { Router } from "./Router";
import type { TemplateEngine } from "./Template";
import type { ResourceDefinition, RouteKind } from "./types";

export type ConventionalKind = "show" | "new" | "index";

export const ROUTE_PATHS: Readonly<Record<ConventionalKind, string>> = {
  show: "/%s/:id",
  new: "/%s/new",
  index: "/%s",
};

export const DEFAULT_DELEGATE_NAMES: Readonly<Record<ConventionalKind, string>> = {
  show: "Record.find_by_id",
  new: "Record.initialize",
  index: "Record.all",
};

export interface RouteTableOptions {
  templates: TemplateEngine;
  service?: string;
}

export interface RouteTable {
  readonly show: (delegateName?: string) => void;
  readonly new: (delegateName?: string) => void;
  readonly index: (delegateName?: string) => void;
  readonly route: (path: string, delegateName: string, kind: RouteKind) => void;
}

export function routePathFor(kind: ConventionalKind, resourceName: string): string {
  return ROUTE_PATHS[kind].replace("%s", resourceName);
}

export function routes(
  definition: ResourceDefinition | Resource,
  block: (r: RouteTable) => void,
  opts: RouteTableOptions
): Router {
  const resource = Resource.wrap(definition);
  const collected: Route[] = [];

  const add = (path: string, delegateName: string, kind: RouteKind) => {
    collected.push(
      new Route({
        path,
        delegateName,
        kind,
        resource,
        templates: opts.templates,
        service: opts.service,
      })
    );
  };

  const conventional =
    (kind: ConventionalKind) =>
    (delegateName?: string): void =>
      add(
        routePathFor(kind, resource.resourceName),
        delegateName ?? DEFAULT_DELEGATE_NAMES[kind],
        kind
      );

  block({
    show: conventional("show"),
    new: conventional("new"),
    index: conventional("index"),
    route: (path, delegateName, kind) => {
      if (!path.startsWith("/")) {
        throw new Error(`Route path must start with "/" (got: "${path}")`);
      }
      add(path, delegateName, kind);
    },
  });

  return new Router(resource, collected, opts.service);
}
