// backend/services/shared/src/routing/index.ts

export type {
  Callable,
  PresenterClass,
  RequestParams,
  ResourceDefinition,
  ResourceRequest,
  RouteKind,
} from "./types";
export type {
  HandlerDescriptor,
  HandlerParams,
  RecordHandlers,
} from "./handlers";
export { handler, variadic, construct } from "./handlers";
export { RoutePath, splitPath, type PathArgs, type PathSegment } from "./RoutePath";
export { InfersArgs, PARAMS_ARG } from "./InfersArgs";
export { Resource, underscore, simpleName } from "./Resource";
export { Route, handlerNameOf, type RouteOptions } from "./Route";
export { Router } from "./Router";
export {
  routes,
  routePathFor,
  ROUTE_PATHS,
  DEFAULT_DELEGATE_NAMES,
  type ConventionalKind,
  type RouteTable,
  type RouteTableOptions,
} from "./routes";
export { App, type Routable } from "./App";
export {
  EjsTemplateEngine,
  type EjsTemplateEngineOptions,
  type TemplateEngine,
} from "./Template";
export {
  RoutingError,
  NoRouteMatches,
  MissingArgument,
  InvalidPathArgument,
  MissingResourceConvention,
  UnknownHandler,
  isRoutingError,
  type RoutingErrorCode,
} from "./errors";
