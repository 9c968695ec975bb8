// backend/services/shared/src/routing/types.ts

import type { RecordHandlers } from "./handlers";

/** Merged query-string and body parameters, single-valued per key. */
export type RequestParams = Readonly<Record<string, unknown>>;

/** What the transport hands the dispatcher. */
export interface ResourceRequest {
  readonly path: string;
  readonly params: RequestParams;
}

/** The conventional kinds, or any custom label. */
export type RouteKind = "show" | "new" | "index" | (string & {});

/** Presenters take the handler's result (a record, or the collection). */
export type PresenterClass = new (value: never) => object;

/**
 * A resource as declared by an application.
 *
 * `name` is the type name (`BlogPost`, or namespaced `Blog::BlogPost` /
 * `Blog.BlogPost`); the routes use its underscored last segment.
 */
export interface ResourceDefinition {
  readonly name: string;
  readonly Record: RecordHandlers;
  readonly PresentsOne: PresenterClass;
  readonly PresentsMany: PresenterClass;
}

/** Anything that can serve a request or say NoRouteMatches. */
export interface Callable {
  call(request: ResourceRequest): Promise<string>;
}
