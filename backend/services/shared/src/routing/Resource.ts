// backend/services/shared/src/routing/Resource.ts
/**
 * Purpose:
 * - Wrap a ResourceDefinition and expose its conventions: underscored name,
 *   Record handlers, singular and plural presenters.
 *
 * Invariants:
 * - Validated once at construction; a missing convention fails at startup,
 *   never on a request.
 * - Read-only after construction.
 */

import type { HandlerDescriptor, RecordHandlers } from "./handlers";
import type { PresenterClass, ResourceDefinition } from "./types";
import { MissingResourceConvention, UnknownHandler } from "./errors";

const NAMESPACE_SEPARATOR_RE = /::|\./;

export function underscore(name: string): string {
  return name.replace(/(.)([A-Z])/g, "$1_$2").toLowerCase();
}

export function simpleName(name: string): string {
  const parts = name.split(NAMESPACE_SEPARATOR_RE);
  return parts[parts.length - 1] ?? name;
}

export class Resource {
  readonly #definition: ResourceDefinition;
  readonly #resourceName: string;

  public static wrap(definition: ResourceDefinition | Resource): Resource {
    return definition instanceof Resource ? definition : new Resource(definition);
  }

  constructor(definition: ResourceDefinition) {
    const label =
      typeof definition?.name === "string" ? definition.name.trim() : "";
    if (!label) {
      throw new MissingResourceConvention("(unnamed)", "a name");
    }
    if (!definition.Record || typeof definition.Record !== "object") {
      throw new MissingResourceConvention(label, "Record");
    }
    if (typeof definition.PresentsOne !== "function") {
      throw new MissingResourceConvention(label, "PresentsOne");
    }
    if (typeof definition.PresentsMany !== "function") {
      throw new MissingResourceConvention(label, "PresentsMany");
    }

    this.#definition = definition;
    this.#resourceName = underscore(simpleName(label));
  }

  public get name(): string {
    return this.#definition.name;
  }

  public get resourceName(): string {
    return this.#resourceName;
  }

  public get recordType(): RecordHandlers {
    return this.#definition.Record;
  }

  public get onePresenter(): PresenterClass {
    return this.#definition.PresentsOne;
  }

  public get manyPresenter(): PresenterClass {
    return this.#definition.PresentsMany;
  }

  public hasHandler(handlerName: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.recordType, handlerName);
  }

  public handler(handlerName: string): HandlerDescriptor {
    if (!this.hasHandler(handlerName)) {
      throw new UnknownHandler(this.name, handlerName);
    }
    const found = this.recordType[handlerName];
    if (!found || typeof found.invoke !== "function") {
      throw new UnknownHandler(this.name, handlerName);
    }
    return found;
  }
}
