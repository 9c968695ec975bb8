// backend/services/shared/test/routing/App.spec.ts
import { describe, it, expect, vi } from "vitest";
import { App, NoRouteMatches, type Callable, type ResourceRequest } from "../../src/routing";

const request: ResourceRequest = { path: "/thing/1", params: {} };

function answering(html: string): Callable {
  return { call: vi.fn(async () => html) };
}

function failing(err: Error): Callable {
  return {
    call: vi.fn(async () => {
      throw err;
    }),
  };
}

describe("App", () => {
  it("falls through NoRouteMatches to the next router", async () => {
    const b = answering("<p>b</p>");
    const app = new App([failing(new NoRouteMatches("/thing/1")), b]);

    expect(await app.call(request)).toBe("<p>b</p>");
    expect(b.call).toHaveBeenCalledWith(request);
  });

  it("stops at the first router that answers", async () => {
    const b = answering("b");
    const app = new App([answering("a"), b]);

    expect(await app.call(request)).toBe("a");
    expect(b.call).not.toHaveBeenCalled();
  });

  it("rethrows the last router's NoRouteMatches as-is", async () => {
    const fromB = new NoRouteMatches("/thing/1");
    const app = new App([failing(new NoRouteMatches("/thing/1")), failing(fromB)]);

    await expect(app.call(request)).rejects.toBe(fromB);
  });

  it("propagates any other error without trying later routers", async () => {
    const boom = new Error("handler exploded");
    const b = answering("b");
    const app = new App([failing(boom), b]);

    await expect(app.call(request)).rejects.toBe(boom);
    expect(b.call).not.toHaveBeenCalled();
  });

  it("raises NoRouteMatches when it has no routers", async () => {
    const app = new App([]);
    await expect(app.call(request)).rejects.toBeInstanceOf(NoRouteMatches);
  });

  it("accepts resource modules exposing Routes", async () => {
    const app = new App([{ Routes: answering("routed") }]);
    expect(await app.call(request)).toBe("routed");
  });
});
