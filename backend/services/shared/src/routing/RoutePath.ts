// backend/services/shared/src/routing/RoutePath.ts
/**
 * Compiled path template: literal segments and `:named` segments.
 *
 * Matching is structural: equal segment counts, literals compared verbatim,
 * named segments accept any value. Named values are integers or nothing.
 */

import { InvalidPathArgument } from "./errors";

export type PathSegment =
  | { readonly kind: "literal"; readonly value: string }
  | { readonly kind: "named"; readonly name: string };

export type PathArgs = Record<string, number>;

const INTEGER_RE = /^[-+]?\d+$/;

export function splitPath(path: string): string[] {
  const parts = path.split("/");
  // "/posts/" and "/posts" are the same path; "/" has no segments.
  while (parts.length > 0 && parts[parts.length - 1] === "") parts.pop();
  return parts;
}

export class RoutePath {
  public readonly template: string;
  public readonly segments: readonly PathSegment[];

  constructor(template: string) {
    this.template = template;
    this.segments = Object.freeze(
      splitPath(template).map((token): PathSegment =>
        token.startsWith(":")
          ? { kind: "named", name: token.slice(1) }
          : { kind: "literal", value: token }
      )
    );
  }

  public get paramNames(): string[] {
    const names: string[] = [];
    for (const s of this.segments) if (s.kind === "named") names.push(s.name);
    return names;
  }

  public matches(path: string): boolean {
    const parts = splitPath(path);
    if (parts.length !== this.segments.length) return false;
    return this.segments.every(
      (s, i) => s.kind === "named" || s.value === parts[i]
    );
  }

  /** Caller is expected to have checked matches(path) first. */
  public extractArgs(path: string): PathArgs {
    const parts = splitPath(path);
    const args: PathArgs = {};
    this.segments.forEach((s, i) => {
      if (s.kind !== "named") return;
      const raw = parts[i] ?? "";
      if (!INTEGER_RE.test(raw)) throw new InvalidPathArgument(s.name, raw);
      const value = Number.parseInt(raw, 10);
      // Beyond 2^53 parseInt rounds to a neighbouring integer.
      if (!Number.isSafeInteger(value)) throw new InvalidPathArgument(s.name, raw);
      args[s.name] = value;
    });
    return args;
  }

  public toString(): string {
    return this.template;
  }
}
