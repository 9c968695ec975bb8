// backend/services/shared/src/routing/Route.ts
/**
 * Purpose:
 * - One path template bound to one Record handler and one rendering target.
 * - call(): infer args → invoke handler → wrap in presenter → render.
 *
 * Invariants:
 * - Immutable and stateless between calls.
 * - Handler and template errors propagate unmodified.
 * - `index` routes present with PresentsMany; every other kind with PresentsOne.
 */

import { ServiceBase } from "../base/ServiceBase";
import type { HandlerDescriptor } from "./handlers";
import { InfersArgs } from "./InfersArgs";
import type { Resource } from "./Resource";
import { RoutePath } from "./RoutePath";
import type { TemplateEngine } from "./Template";
import type { Callable, PresenterClass, ResourceRequest, RouteKind } from "./types";

/** "Record.find_by_id" and "find_by_id" name the same handler. */
export function handlerNameOf(delegateName: string): string {
  const parts = delegateName.trim().split(".");
  return parts[parts.length - 1] ?? delegateName;
}

export interface RouteOptions {
  path: string;
  delegateName: string;
  kind: RouteKind;
  resource: Resource;
  templates: TemplateEngine;
  service?: string;
}

export class Route extends ServiceBase implements Callable {
  public readonly path: RoutePath;
  public readonly handlerName: string;
  public readonly kind: RouteKind;
  public readonly resource: Resource;
  private readonly descriptor: HandlerDescriptor;
  private readonly templates: TemplateEngine;

  constructor(opts: RouteOptions) {
    super({
      service: opts.service,
      context: { resource: opts.resource.resourceName, kind: opts.kind },
    });
    this.path = new RoutePath(opts.path);
    this.handlerName = handlerNameOf(opts.delegateName);
    this.kind = opts.kind;
    this.resource = opts.resource;
    // Resolved at registration so an unknown handler fails at startup.
    this.descriptor = opts.resource.handler(this.handlerName);
    this.templates = opts.templates;
  }

  public matches(path: string): boolean {
    return this.path.matches(path);
  }

  public isPlural(): boolean {
    return this.kind === "index";
  }

  public presenterClass(): PresenterClass {
    return this.isPlural()
      ? this.resource.manyPresenter
      : this.resource.onePresenter;
  }

  public async call(request: ResourceRequest): Promise<string> {
    const log = this.bindLog({ path: request.path, route: this.path.template });
    log.debug({ handler: this.handlerName }, "route_enter");

    const args = InfersArgs.for(
      this.handlerName,
      this.descriptor,
      this.path.extractArgs(request.path),
      request.params
    );
    const record = await this.descriptor.invoke(args);
    const presenter: object = Reflect.construct(this.presenterClass(), [record]);
    const html = await this.templates.render(
      presenter,
      this.resource.resourceName,
      this.kind
    );

    log.debug({ handler: this.handlerName, bytes: html.length }, "route_exit");
    return html;
  }
}
