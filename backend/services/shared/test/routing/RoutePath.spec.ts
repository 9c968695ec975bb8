// backend/services/shared/test/routing/RoutePath.spec.ts
import { describe, it, expect } from "vitest";
import { InvalidPathArgument, RoutePath, splitPath } from "../../src/routing";

describe("splitPath", () => {
  it("drops trailing empty segments", () => {
    expect(splitPath("/post/")).toEqual(["", "post"]);
    expect(splitPath("/post")).toEqual(["", "post"]);
    expect(splitPath("/")).toEqual([]);
  });
});

describe("RoutePath", () => {
  const show = new RoutePath("/post/:id");

  it("compiles literal and named segments", () => {
    expect(show.segments).toEqual([
      { kind: "literal", value: "" },
      { kind: "literal", value: "post" },
      { kind: "named", name: "id" },
    ]);
    expect(new RoutePath("/a/:x/b/:y").paramNames).toEqual(["x", "y"]);
  });

  it("matches on equal segment counts with equal literals", () => {
    expect(show.matches("/post/42")).toBe(true);
    expect(show.matches("/post/42/")).toBe(true);
    expect(show.matches("/post")).toBe(false);
    expect(show.matches("/post/42/extra")).toBe(false);
    expect(show.matches("/posts/42")).toBe(false);
  });

  it("accepts any value in a named segment when matching", () => {
    expect(show.matches("/post/new")).toBe(true);
  });

  it("extracts named segments as integers", () => {
    expect(show.extractArgs("/post/42")).toEqual({ id: 42 });
    expect(show.extractArgs("/post/-3")).toEqual({ id: -3 });
    expect(show.extractArgs("/post/007")).toEqual({ id: 7 });
    expect(new RoutePath("/post").extractArgs("/post")).toEqual({});
  });

  it("rejects non-integer path values", () => {
    expect(() => show.extractArgs("/post/abc")).toThrow(InvalidPathArgument);
    expect(() => show.extractArgs("/post/4.2")).toThrow(
      'Path argument "id" must be an integer (got: "4.2")'
    );
  });

  it("rejects integers too large to represent exactly", () => {
    expect(() => show.extractArgs("/post/9007199254740993")).toThrow(
      'Path argument "id" must be an integer (got: "9007199254740993")'
    );
    expect(show.extractArgs("/post/9007199254740991")).toEqual({
      id: Number.MAX_SAFE_INTEGER,
    });
  });

  it("prints as its template", () => {
    expect(String(show)).toBe("/post/:id");
  });
});
