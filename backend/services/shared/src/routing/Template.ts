// backend/services/shared/src/routing/Template.ts
/**
 * Purpose:
 * - Rendering adapter. A template is located by convention at
 *   `<viewsDir>/<resourceName>/<kind>.html.ejs` and rendered with exactly
 *   one bound value: the presenter.
 *
 * Notes:
 * - Presenter members (fields, getters, methods) are reachable by bare name
 *   inside the template, and through `this`.
 * - ejs caching is opt-in; compiled templates are keyed by filename.
 */

import path from "node:path";
import ejs from "ejs";
import { ServiceBase } from "../base/ServiceBase";
import type { RouteKind } from "./types";

export interface TemplateEngine {
  render(presenter: object, resourceName: string, kind: RouteKind): Promise<string>;
}

export interface EjsTemplateEngineOptions {
  viewsDir: string;
  cache?: boolean;
  extension?: string;
  service?: string;
}

export class EjsTemplateEngine extends ServiceBase implements TemplateEngine {
  private readonly viewsDir: string;
  private readonly cache: boolean;
  private readonly extension: string;

  constructor(opts: EjsTemplateEngineOptions) {
    super({ service: opts.service, context: { viewsDir: opts.viewsDir } });
    if (!opts.viewsDir?.trim()) {
      throw new Error("EjsTemplateEngine: viewsDir is required.");
    }
    this.viewsDir = path.resolve(opts.viewsDir);
    this.cache = opts.cache ?? false;
    this.extension = opts.extension ?? ".html.ejs";
  }

  public templatePath(resourceName: string, kind: RouteKind): string {
    return path.join(this.viewsDir, resourceName, `${kind}${this.extension}`);
  }

  public async render(
    presenter: object,
    resourceName: string,
    kind: RouteKind
  ): Promise<string> {
    const file = this.templatePath(resourceName, kind);
    // Locals inherit from the presenter so ejs' `with (locals)` scope sees
    // prototype getters and methods, not only own fields.
    const locals: ejs.Data = Object.create(presenter);

    const html = await ejs.renderFile(file, locals, {
      cache: this.cache,
      context: presenter,
      async: false,
    });

    this.log.debug({ file, resourceName, kind }, "template_rendered");
    return html;
  }
}
