/**
 * Filter engine.
 *
 * A filter pass is a linear scan over the collection. Each entity is tested
 * against the criteria in a fixed order (class, object kind, key/value) and
 * the first failing check skips it. Matches keep their input order and
 * identity; neither the entities nor the criteria are modified.
 */

import type { Entity } from "./entity.js";
import { matchText } from "./value.js";

export const OBJECT_KINDS = ["everything", "mesh", "point"] as const;

export type ObjectKind = (typeof OBJECT_KINDS)[number];

export interface FilterCriteria {
  readonly objectKind: ObjectKind;
  /** Case-insensitive substring of the classname. Empty means no constraint. */
  readonly classFilter: string;
  readonly keyFilter: string;
  readonly valueFilter: string;
  /** Exact value equality instead of case-insensitive substring. */
  readonly matchWholeValue: boolean;
}

export interface EntityRow {
  entity: Entity;
  /** Position in the full collection. */
  index: number;
  classname: string;
  targetname: string;
}

export function emptyCriteria(): FilterCriteria {
  return {
    objectKind: "everything",
    classFilter: "",
    keyFilter: "",
    valueFilter: "",
    matchWholeValue: false,
  };
}

export function criteria(partial: Partial<FilterCriteria> = {}): FilterCriteria {
  return { ...emptyCriteria(), ...partial };
}

const OBJECT_KIND_ALIASES: Record<string, ObjectKind> = {
  everything: "everything",
  all: "everything",
  mesh: "mesh",
  "mesh-entities": "mesh",
  point: "point",
  "point-entities": "point",
};

export function parseObjectKind(text: string): ObjectKind | undefined {
  return OBJECT_KIND_ALIASES[text.trim().toLowerCase()];
}

function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function valueMatches(text: string, value: string, matchWholeValue: boolean): boolean {
  return matchWholeValue ? text === value : containsIgnoreCase(text, value);
}

export function containsKey(entity: Entity, key: string): boolean {
  for (const name of entity.properties.keys()) {
    if (containsIgnoreCase(name, key)) return true;
  }
  return false;
}

export function containsValue(entity: Entity, value: string, matchWholeValue: boolean): boolean {
  for (const propertyValue of entity.properties.values()) {
    if (valueMatches(matchText(propertyValue), value, matchWholeValue)) return true;
  }
  return false;
}

/** Key and value must both hold for the same property. */
export function containsKeyValue(
  entity: Entity,
  key: string,
  value: string,
  matchWholeValue: boolean,
): boolean {
  for (const [name, propertyValue] of entity.properties) {
    if (!containsIgnoreCase(name, key)) continue;
    if (valueMatches(matchText(propertyValue), value, matchWholeValue)) return true;
  }
  return false;
}

function matchesObjectKind(entity: Entity, kind: ObjectKind): boolean {
  switch (kind) {
    case "everything":
      return true;
    case "mesh":
      return entity.isMeshEntity;
    case "point":
      return !entity.isMeshEntity;
  }
}

export function matchesCriteria(entity: Entity, filter: FilterCriteria): boolean {
  if (filter.classFilter !== "" && !containsIgnoreCase(entity.classname, filter.classFilter)) {
    return false;
  }

  if (!matchesObjectKind(entity, filter.objectKind)) {
    return false;
  }

  const hasKey = filter.keyFilter !== "";
  const hasValue = filter.valueFilter !== "";

  if (hasKey && hasValue) {
    return containsKeyValue(entity, filter.keyFilter, filter.valueFilter, filter.matchWholeValue);
  }
  if (hasKey) {
    return containsKey(entity, filter.keyFilter);
  }
  if (hasValue) {
    return containsValue(entity, filter.valueFilter, filter.matchWholeValue);
  }
  return true;
}

export function filterEntities(entities: readonly Entity[], filter: FilterCriteria): Entity[] {
  return entities.filter((entity) => matchesCriteria(entity, filter));
}

/**
 * Same pass as filterEntities, also carrying each survivor's position and
 * the classname/targetname columns a result grid shows.
 */
export function filterRows(entities: readonly Entity[], filter: FilterCriteria): EntityRow[] {
  const rows: EntityRow[] = [];
  entities.forEach((entity, index) => {
    if (!matchesCriteria(entity, filter)) return;
    rows.push({
      entity,
      index,
      classname: entity.classname,
      targetname: entity.targetname,
    });
  });
  return rows;
}
