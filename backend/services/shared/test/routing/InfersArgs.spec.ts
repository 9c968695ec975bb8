// backend/services/shared/test/routing/InfersArgs.spec.ts
import { describe, it, expect } from "vitest";
import { InfersArgs, MissingArgument, handler, variadic } from "../../src/routing";

describe("InfersArgs.for", () => {
  const params = Object.freeze({ q: "routes", page: "2" });

  it("gives a variadic handler no arguments", () => {
    const d = variadic(() => "all");
    expect(InfersArgs.for("all", d, { id: 7 }, params)).toEqual([]);
  });

  it("binds a path argument by name", () => {
    const d = handler(["id"], (id: number) => id);
    expect(InfersArgs.for("find_by_id", d, { id: 7 }, params)).toEqual([7]);
  });

  it("binds the whole params map to `params`", () => {
    const d = handler(["params"], (p: unknown) => p);
    const [bound] = InfersArgs.for("search", d, {}, params);
    expect(bound).toBe(params);
  });

  it("keeps declaration order across sources", () => {
    const d = handler(["params", "id"], (_p: unknown, id: number) => id);
    expect(InfersArgs.for("h", d, { id: 3 }, params)).toEqual([params, 3]);
  });

  it("lets `params` win over a path argument of the same name", () => {
    const d = handler(["params"], (p: unknown) => p);
    expect(InfersArgs.for("h", d, { params: 5 }, params)).toEqual([params]);
  });

  it("does not bind individual request keys by name", () => {
    const d = handler(["q"], (q: string) => q);
    expect(() => InfersArgs.for("search", d, {}, params)).toThrow(MissingArgument);
  });

  it("names the missing parameter and handler", () => {
    const d = handler(["slug"], (slug: string) => slug);
    expect(() => InfersArgs.for("find_by_slug", d, { id: 1 }, params)).toThrow(
      'Handler "find_by_slug" requires "slug" but the request does not provide it'
    );
  });

  it("gives a zero-parameter handler no arguments", () => {
    const d = handler([], () => "none");
    expect(InfersArgs.for("h", d, { id: 1 }, params)).toEqual([]);
  });
});
