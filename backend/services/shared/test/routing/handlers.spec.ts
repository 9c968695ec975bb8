// backend/services/shared/test/routing/handlers.spec.ts
import { describe, it, expect } from "vitest";
import { construct, handler, variadic } from "../../src/routing";

class Pair {
  constructor(
    public readonly left: number,
    public readonly right: number
  ) {}
}

describe("handler descriptors", () => {
  it("invokes a named handler positionally", async () => {
    const d = handler(["a", "b"], (a: number, b: number) => a - b);
    expect(d.params).toEqual({ kind: "named", names: ["a", "b"] });
    expect(await d.invoke([5, 3])).toBe(2);
  });

  it("passes async results through", async () => {
    const d = handler(["id"], async (id: number) => ({ id }));
    expect(await d.invoke([9])).toEqual({ id: 9 });
  });

  it("marks variadic handlers", () => {
    const d = variadic(() => "all");
    expect(d.params).toEqual({ kind: "variadic" });
    expect(d.invoke([])).toBe("all");
  });

  it("constructs for constructor-backed handlers", () => {
    const d = construct(["left", "right"], Pair);
    const made = d.invoke([1, 2]);
    expect(made).toBeInstanceOf(Pair);
    expect(made).toEqual(new Pair(1, 2));
  });

  it("rejects duplicate or blank parameter names", () => {
    expect(() => handler(["id", "id"], (id: number) => id)).toThrow(
      'Handler parameter "id" is declared twice'
    );
    expect(() => handler([" "], () => 1)).toThrow(
      "Handler parameter names must be non-empty strings"
    );
  });
});
