/**
 * Cross-reference resolution by targetname.
 *
 * Lookups are plain linear scans over the whole collection, ignoring any
 * active filter. Duplicate targetnames are legal; the first entity in
 * collection order wins.
 */

import type { Connection, Entity } from "./entity.js";

export interface ResolvedConnection {
  connection: Connection;
  target: Entity | undefined;
}

export interface Referrer {
  entity: Entity;
  connection: Connection;
}

export interface BrokenConnection {
  source: Entity;
  /** Position of the source in the collection. */
  sourceIndex: number;
  connection: Connection;
  targetName: string;
}

export function resolveByTargetName(entities: readonly Entity[], name: string): Entity | undefined {
  if (name === "") return undefined;

  for (const entity of entities) {
    if (entity.targetname === "") continue;
    if (entity.targetname === name) return entity;
  }

  return undefined;
}

export function findAllByTargetName(entities: readonly Entity[], name: string): Entity[] {
  if (name === "") return [];
  return entities.filter((entity) => entity.targetname !== "" && entity.targetname === name);
}

/**
 * Names beginning with "!" are runtime keywords (!self, !activator, !player)
 * rather than targetnames.
 */
export function isKeywordTarget(name: string): boolean {
  return name.startsWith("!");
}

export function resolveConnections(entities: readonly Entity[], entity: Entity): ResolvedConnection[] {
  return entity.outputs.map((connection) => ({
    connection,
    target: resolveByTargetName(entities, connection.targetName ?? ""),
  }));
}

export function findReferrers(entities: readonly Entity[], entity: Entity): Referrer[] {
  const name = entity.targetname;
  if (name === "") return [];

  const referrers: Referrer[] = [];
  for (const source of entities) {
    for (const connection of source.outputs) {
      if (connection.targetName === name) {
        referrers.push({ entity: source, connection });
      }
    }
  }
  return referrers;
}

export function findBrokenConnections(entities: readonly Entity[]): BrokenConnection[] {
  const names = new Set<string>();
  for (const entity of entities) {
    if (entity.targetname !== "") names.add(entity.targetname);
  }

  const broken: BrokenConnection[] = [];
  entities.forEach((source, sourceIndex) => {
    for (const connection of source.outputs) {
      const targetName = connection.targetName ?? "";
      if (targetName === "" || isKeywordTarget(targetName)) continue;
      if (!names.has(targetName)) {
        broken.push({ source, sourceIndex, connection, targetName });
      }
    }
  });
  return broken;
}
