// backend/services/shared/src/routing/handlers.ts
/**
 * Purpose:
 * - Handler descriptors: a callable plus its declared parameter names,
 *   fixed at definition time. Argument inference reads `params`; nothing
 *   is introspected per call.
 *
 * Notes:
 * - Bound values are whatever the request yields (integers from the path,
 *   the raw params map), so handlers receive them untyped via Reflect.
 * - `construct()` declares a constructor-backed handler (the `new` kind);
 *   its parameter list is the constructor's, not the wrapper's.
 */

export type HandlerParams =
  | { readonly kind: "named"; readonly names: readonly string[] }
  | { readonly kind: "variadic" };

export interface HandlerDescriptor<TResult = unknown> {
  readonly params: HandlerParams;
  invoke(args: readonly unknown[]): TResult | Promise<TResult>;
}

/** The handler-bearing side of a resource: handler name → descriptor. */
export type RecordHandlers = Readonly<Record<string, HandlerDescriptor>>;

export function handler<TResult>(
  names: readonly string[],
  fn: (...args: never[]) => TResult | Promise<TResult>
): HandlerDescriptor<TResult> {
  assertNames(names);
  return {
    params: { kind: "named", names: [...names] },
    invoke: (args) => Reflect.apply(fn, undefined, args),
  };
}

export function variadic<TResult>(
  fn: (...args: unknown[]) => TResult | Promise<TResult>
): HandlerDescriptor<TResult> {
  return {
    params: { kind: "variadic" },
    invoke: (args) => fn(...args),
  };
}

export function construct<TInstance>(
  names: readonly string[],
  ctor: new (...args: never[]) => TInstance
): HandlerDescriptor<TInstance> {
  assertNames(names);
  return {
    params: { kind: "named", names: [...names] },
    invoke: (args) => Reflect.construct(ctor, args),
  };
}

function assertNames(names: readonly string[]): void {
  const seen = new Set<string>();
  for (const n of names) {
    if (!n || !n.trim()) {
      throw new Error("Handler parameter names must be non-empty strings");
    }
    if (seen.has(n)) {
      throw new Error(`Handler parameter "${n}" is declared twice`);
    }
    seen.add(n);
  }
}
