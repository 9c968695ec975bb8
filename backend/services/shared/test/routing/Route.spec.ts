// backend/services/shared/test/routing/Route.spec.ts
import { describe, it, expect } from "vitest";
import {
  InvalidPathArgument,
  Resource,
  Route,
  UnknownHandler,
  handler,
  handlerNameOf,
  type ResourceDefinition,
} from "../../src/routing";
import {
  RecordingTemplates,
  WidgetDraft,
  WidgetPresenter,
  WidgetsPresenter,
  widgetDefinition,
} from "./widget.fixture";

function routeFor(
  path: string,
  delegateName: string,
  kind: string,
  definition: ResourceDefinition = widgetDefinition()
) {
  const templates = new RecordingTemplates();
  const route = new Route({
    path,
    delegateName,
    kind,
    resource: new Resource(definition),
    templates,
  });
  return { route, templates };
}

describe("handlerNameOf", () => {
  it("takes the text after the last dot", () => {
    expect(handlerNameOf("Record.find_by_id")).toBe("find_by_id");
    expect(handlerNameOf("all")).toBe("all");
  });
});

describe("Route", () => {
  it("renders the handler result through the singular presenter", async () => {
    const { route, templates } = routeFor("/widget/:id", "Record.find_by_id", "show");

    const html = await route.call({ path: "/widget/5", params: {} });

    expect(html).toBe("widget/show");
    expect(templates.calls).toHaveLength(1);
    const [call] = templates.calls;
    expect(call.resourceName).toBe("widget");
    expect(call.kind).toBe("show");
    expect(call.presenter).toBeInstanceOf(WidgetPresenter);
    expect(call.presenter).toEqual(new WidgetPresenter({ id: 5, name: "widget 5" }));
  });

  it("uses the plural presenter for index routes only", async () => {
    const index = routeFor("/widget", "Record.all", "index");
    expect(index.route.isPlural()).toBe(true);
    await index.route.call({ path: "/widget", params: {} });
    expect(index.templates.calls[0].presenter).toBeInstanceOf(WidgetsPresenter);

    const custom = routeFor("/widget/first", "Record.first", "featured");
    expect(custom.route.isPlural()).toBe(false);
    expect(custom.route.presenterClass()).toBe(WidgetPresenter);
  });

  it("constructs the record for constructor-backed handlers", async () => {
    const { route, templates } = routeFor("/widget/new", "Record.initialize", "new");
    await route.call({ path: "/widget/new", params: { name: "cog" } });
    expect(templates.calls[0].presenter).toEqual(
      new WidgetPresenter(new WidgetDraft({ name: "cog" }))
    );
  });

  it("fails at construction for an unknown handler", () => {
    expect(() => routeFor("/widget/:id", "Record.missing", "show")).toThrow(UnknownHandler);
  });

  it("propagates handler errors unchanged", async () => {
    const boom = new Error("store offline");
    const definition: ResourceDefinition = {
      ...widgetDefinition(),
      Record: {
        find_by_id: handler(["id"], (_id: number) => {
          throw boom;
        }),
      },
    };
    const { route, templates } = routeFor("/widget/:id", "find_by_id", "show", definition);

    await expect(route.call({ path: "/widget/1", params: {} })).rejects.toBe(boom);
    expect(templates.calls).toHaveLength(0);
  });

  it("raises InvalidPathArgument before calling the handler", async () => {
    const { route, templates } = routeFor("/widget/:id", "Record.find_by_id", "show");
    await expect(route.call({ path: "/widget/new", params: {} })).rejects.toBeInstanceOf(
      InvalidPathArgument
    );
    expect(templates.calls).toHaveLength(0);
  });
});
