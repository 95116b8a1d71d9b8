/**
 * Entity model.
 *
 * An entity is an ordered bag of named properties plus an optional list of
 * output connections, read from a parent container (an "entity lump").
 * Entities are immutable once built.
 */

import { displayValue } from "./value.js";

export type PropertyValue =
  | { kind: "absent" }
  | { kind: "scalar"; value: string }
  | { kind: "sequence"; items: readonly string[] };

export function absent(): PropertyValue {
  return { kind: "absent" };
}

export function scalar(value: string): PropertyValue {
  return { kind: "scalar", value };
}

export function sequence(items: readonly string[]): PropertyValue {
  return { kind: "sequence", items: Object.freeze([...items]) };
}

function scalarText(raw: unknown): string | undefined {
  switch (typeof raw) {
    case "string":
      return raw;
    case "number":
    case "boolean":
    case "bigint":
      return String(raw);
    default:
      return undefined;
  }
}

/**
 * Convert a parsed raw value to a PropertyValue. Values that have no
 * sensible string form degrade to an empty scalar.
 */
export function toPropertyValue(raw: unknown): PropertyValue {
  if (raw === null || raw === undefined) return absent();
  if (Array.isArray(raw)) {
    return sequence(raw.map((item: unknown) => scalarText(item) ?? ""));
  }
  return scalar(scalarText(raw) ?? "");
}

export interface Connection {
  readonly outputName?: string;
  readonly targetName?: string;
  readonly inputName?: string;
  readonly overrideParam?: string;
  readonly delay?: number;
  /** -1 and 0 are kept as given. */
  readonly timesToFire?: number;
}

export interface EntityInit {
  properties?: Record<string, unknown> | Iterable<readonly [string, unknown]>;
  connections?: readonly Connection[];
  parentContainerName?: string;
}

export class Entity {
  readonly properties: ReadonlyMap<string, PropertyValue>;
  readonly connections: readonly Connection[] | undefined;
  readonly parentContainerName: string | undefined;
  readonly classname: string;
  readonly targetname: string;

  constructor(
    properties: ReadonlyMap<string, PropertyValue>,
    connections?: readonly Connection[],
    parentContainerName?: string,
  ) {
    this.properties = new Map(properties);
    this.connections = connections ? Object.freeze([...connections]) : undefined;
    this.parentContainerName = parentContainerName;
    this.classname = this.getProperty("classname");
    this.targetname = this.getProperty("targetname");
    Object.freeze(this);
  }

  /**
   * Display string of a property, or `defaultValue` when the key is missing
   * or holds no value.
   */
  getProperty(name: string, defaultValue = ""): string {
    const value = this.properties.get(name);
    if (value === undefined || value.kind === "absent") return defaultValue;
    return displayValue(value);
  }

  hasProperty(name: string): boolean {
    return this.properties.has(name);
  }

  /** Entities with a `model` are brush/mesh entities; the rest are point entities. */
  get isMeshEntity(): boolean {
    return this.hasProperty("model");
  }

  get outputs(): readonly Connection[] {
    return this.connections ?? [];
  }
}

function isEntryIterable(
  value: Record<string, unknown> | Iterable<readonly [string, unknown]>,
): value is Iterable<readonly [string, unknown]> {
  return Symbol.iterator in value;
}

export function createEntity(init: EntityInit = {}): Entity {
  const properties = new Map<string, PropertyValue>();
  const raw = init.properties ?? {};
  const entries = isEntryIterable(raw) ? raw : Object.entries(raw);
  for (const [key, value] of entries) {
    properties.set(key, toPropertyValue(value));
  }
  return new Entity(properties, init.connections, init.parentContainerName);
}
