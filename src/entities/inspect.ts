/**
 * Flattening of a single entity for a properties panel.
 */

import type { Entity } from "./entity.js";
import type { EntityRow } from "./filter.js";
import { exportConnection } from "./export.js";
import type { ExportedConnection } from "./export.js";
import { displayValue } from "./value.js";

export type ConnectionRow = ExportedConnection;

export interface PropertyRow {
  key: string;
  value: string;
}

export interface EntityDescription {
  title: string;
  properties: PropertyRow[];
  connections: ConnectionRow[];
  hasOutputs: boolean;
  source?: string;
}

export function panelTitle(entity: Entity): string {
  let title = "Entity Properties";

  if (entity.targetname !== "") {
    title += ` - ${entity.targetname}`;
  } else if (entity.classname !== "") {
    title += ` - ${entity.classname}`;
  }

  if (entity.parentContainerName !== undefined) {
    title += ` - Entity Lump: ${entity.parentContainerName}`;
  }

  return title;
}

export function describeEntity(entity: Entity): EntityDescription {
  const properties: PropertyRow[] = [];
  for (const [key, value] of entity.properties) {
    properties.push({ key, value: displayValue(value) });
  }

  const connections = entity.outputs.map(exportConnection);

  return {
    title: panelTitle(entity),
    properties,
    connections,
    hasOutputs: connections.length > 0,
    ...(entity.parentContainerName !== undefined ? { source: entity.parentContainerName } : {}),
  };
}

/** After a filter pass the panel shows the first surviving row. */
export function selectEntity(rows: readonly EntityRow[]): Entity | undefined {
  return rows[0]?.entity;
}

/** worldspawn covers the whole map and is never focused in a viewport. */
export function canFocus(entity: Entity): boolean {
  return entity.classname !== "worldspawn";
}
