// backend/services/shared/test/routing/Resource.spec.ts
import { describe, it, expect } from "vitest";
import {
  MissingResourceConvention,
  Resource,
  UnknownHandler,
  simpleName,
  underscore,
  type ResourceDefinition,
} from "../../src/routing";
import { WidgetPresenter, WidgetsPresenter, widgetDefinition } from "./widget.fixture";

describe("resource naming", () => {
  it("underscores camel-cased type names", () => {
    expect(underscore("BlogPost")).toBe("blog_post");
    expect(underscore("Widget")).toBe("widget");
  });

  it("keeps the last segment of a namespaced name", () => {
    expect(simpleName("Blog::BlogPost")).toBe("BlogPost");
    expect(simpleName("Blog.BlogPost")).toBe("BlogPost");
    expect(simpleName("Post")).toBe("Post");
  });

  it("derives the resource name from the definition", () => {
    expect(new Resource(widgetDefinition()).resourceName).toBe("widget");
    expect(new Resource(widgetDefinition("Shop::GearBox")).resourceName).toBe("gear_box");
  });
});

describe("Resource", () => {
  const resource = new Resource(widgetDefinition());

  it("exposes presenters and handlers", () => {
    expect(resource.name).toBe("Widget");
    expect(resource.onePresenter).toBe(WidgetPresenter);
    expect(resource.manyPresenter).toBe(WidgetsPresenter);
    expect(resource.hasHandler("find_by_id")).toBe(true);
    expect(resource.handler("all").params).toEqual({ kind: "variadic" });
  });

  it("does not treat inherited members as handlers", () => {
    expect(resource.hasHandler("toString")).toBe(false);
    expect(() => resource.handler("toString")).toThrow(UnknownHandler);
  });

  it("reports an unknown handler with the resource name", () => {
    expect(() => resource.handler("nope")).toThrow(
      'Resource "Widget" has no Record handler "nope"'
    );
  });

  it("wraps a definition once", () => {
    expect(Resource.wrap(resource)).toBe(resource);
    expect(Resource.wrap(widgetDefinition())).toBeInstanceOf(Resource);
  });

  it("fails at construction when a convention is missing", () => {
    const { PresentsOne: _dropped, ...rest } = widgetDefinition();
    const broken = rest as unknown as ResourceDefinition;
    expect(() => new Resource(broken)).toThrow(MissingResourceConvention);
    expect(() => new Resource(broken)).toThrow(
      'Resource "Widget" does not define PresentsOne'
    );
  });

  it("requires a name", () => {
    expect(() => new Resource(widgetDefinition("  "))).toThrow(
      'Resource "(unnamed)" does not define a name'
    );
  });
});
