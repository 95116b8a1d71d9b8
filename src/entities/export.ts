/**
 * Export transformer.
 *
 * Projects a selection of entities into a self-contained document. Entity
 * records always carry `properties`; `connections` and `sourceLump` appear
 * only when the entity has them.
 */

import { stringify } from "csv-stringify/sync";
import type { Connection, Entity } from "./entity.js";
import { toOrderedJson, toOrderedYaml } from "./serialize.js";
import type { OrderedValue } from "./serialize.js";
import { exportValue } from "./value.js";
import type { ExportValue } from "./value.js";

export const DEFAULT_EXPORT_FILE_NAME = "entities_export.json";

export type NonEmptyArray<T> = readonly [T, ...T[]];

export type ExportFormat = "json" | "yaml" | "csv";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["json", "yaml", "csv"];

export interface ExportedConnection {
  output: string;
  target: string;
  input: string;
  parameter: string;
  delay: number;
  timesToFire: number;
}

export interface ExportedEntity {
  /** In the entity's own key order, which serialization keeps. */
  properties: ReadonlyMap<string, ExportValue>;
  connections?: ExportedConnection[];
  sourceLump?: string;
}

export interface ExportDocument {
  entityCount: number;
  exportDate: string;
  entities: ExportedEntity[];
}

export function isNonEmpty<T>(list: readonly T[]): list is NonEmptyArray<T> {
  return list.length > 0;
}

export function parseExportFormat(text: string): ExportFormat | undefined {
  return EXPORT_FORMATS.find((f) => f === text.toLowerCase());
}

export function exportConnection(connection: Connection): ExportedConnection {
  return {
    output: connection.outputName ?? "",
    target: connection.targetName ?? "",
    input: connection.inputName ?? "",
    parameter: connection.overrideParam ?? "",
    delay: connection.delay ?? 0,
    timesToFire: connection.timesToFire ?? 0,
  };
}

export function exportEntity(entity: Entity): ExportedEntity {
  const properties = new Map<string, ExportValue>();
  for (const [key, value] of entity.properties) {
    properties.set(key, exportValue(value));
  }

  const record: ExportedEntity = { properties };

  if (entity.outputs.length > 0) {
    record.connections = entity.outputs.map(exportConnection);
  }

  if (entity.parentContainerName !== undefined) {
    record.sourceLump = entity.parentContainerName;
  }

  return record;
}

/**
 * Build the export document. Callers check the selection with isNonEmpty
 * first and tell the user when nothing is selected.
 */
export function buildExport(entities: NonEmptyArray<Entity>, now: Date = new Date()): ExportDocument {
  return {
    entityCount: entities.length,
    exportDate: now.toISOString(),
    entities: entities.map(exportEntity),
  };
}

export function connectionTree(connection: ExportedConnection): OrderedValue {
  return new Map<string, OrderedValue>([
    ["output", connection.output],
    ["target", connection.target],
    ["input", connection.input],
    ["parameter", connection.parameter],
    ["delay", connection.delay],
    ["timesToFire", connection.timesToFire],
  ]);
}

function entityTree(entity: ExportedEntity): OrderedValue {
  const tree = new Map<string, OrderedValue>([["properties", entity.properties]]);
  if (entity.connections !== undefined) {
    tree.set("connections", entity.connections.map(connectionTree));
  }
  if (entity.sourceLump !== undefined) {
    tree.set("sourceLump", entity.sourceLump);
  }
  return tree;
}

function exportDocumentTree(document: ExportDocument): OrderedValue {
  return new Map<string, OrderedValue>([
    ["entityCount", document.entityCount],
    ["exportDate", document.exportDate],
    ["entities", document.entities.map(entityTree)],
  ]);
}

function exportDocumentToCsv(document: ExportDocument): string {
  const keys = new Set<string>();
  for (const entity of document.entities) {
    for (const key of entity.properties.keys()) {
      keys.add(key);
    }
  }
  const columns = [...keys].sort();

  const header = ["source", ...columns];
  const rows = document.entities.map((entity) => [
    entity.sourceLump ?? "",
    ...columns.map((key) => {
      const value = entity.properties.get(key);
      if (value === undefined) return "";
      return Array.isArray(value) ? value.join(" ") : value;
    }),
  ]);
  return stringify([header, ...rows]);
}

export function serializeExport(document: ExportDocument, format: ExportFormat = "json"): string {
  switch (format) {
    case "yaml":
      return toOrderedYaml(exportDocumentTree(document));
    case "csv":
      return exportDocumentToCsv(document);
    case "json":
    default:
      return toOrderedJson(exportDocumentTree(document)) + "\n";
  }
}

