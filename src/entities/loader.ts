/**
 * Loader for entity lump documents.
 *
 * Lump documents are YAML (or JSON) with this structure:
 *
 * ```yaml
 * name: maps/example/entities/default_ents.vents
 * entities:
 *   - properties:
 *       classname: func_door
 *       targetname: door01
 *       model: models/door.vmdl
 *       origin: [0, 128, 64]
 *     connections:
 *       - m_outputName: OnOpen
 *         m_targetName: relay01
 *         m_inputName: Trigger
 *         m_flDelay: 0.5
 *         m_nTimesToFire: -1
 * ```
 *
 * A bare sequence of entity records is accepted too, and so is a document
 * written by `buildExport` (its `sourceLump` becomes the container name).
 */

import * as fs from "node:fs";
import * as yaml from "js-yaml";
import { createEntity } from "./entity.js";
import type { Connection, Entity } from "./entity.js";

export type LoadErrorCode =
  | "file_not_found"
  | "permission_denied"
  | "invalid_yaml"
  | "invalid_document";

export interface LoadError {
  code: LoadErrorCode;
  message: string;
  line?: number;
}

export interface EntityLump {
  name?: string;
  entities: Entity[];
}

export interface LoadResult {
  lump?: EntityLump;
  error?: LoadError;
}

export class LumpError extends Error {
  code: LoadErrorCode;

  constructor(code: LoadErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

function optionalNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function pick(raw: RawRecord, ...keys: string[]): unknown {
  for (const key of keys) {
    if (key in raw) return raw[key];
  }
  return undefined;
}

function parseConnection(raw: RawRecord): Connection {
  return {
    outputName: optionalString(pick(raw, "m_outputName", "output")),
    targetName: optionalString(pick(raw, "m_targetName", "target")),
    inputName: optionalString(pick(raw, "m_inputName", "input")),
    overrideParam: optionalString(pick(raw, "m_overrideParam", "parameter")),
    delay: optionalNumber(pick(raw, "m_flDelay", "delay")),
    timesToFire: optionalNumber(pick(raw, "m_nTimesToFire", "timesToFire")),
  };
}

const RECORD_KEYS: ReadonlySet<string> = new Set(["connections", "sourceLump"]);

function parseEntity(raw: unknown, index: number, lumpName: string | undefined): Entity | LoadError {
  if (!isRecord(raw)) {
    return { code: "invalid_document", message: `entity ${index}: expected a mapping` };
  }

  let properties: Array<[string, unknown]>;
  if ("properties" in raw) {
    if (raw.properties === null || raw.properties === undefined) {
      properties = [];
    } else if (isRecord(raw.properties)) {
      properties = Object.entries(raw.properties);
    } else {
      return { code: "invalid_document", message: `entity ${index}: properties must be a mapping` };
    }
  } else {
    // Flat form: every key but the record-level ones is a property.
    properties = Object.entries(raw).filter(([key]) => !RECORD_KEYS.has(key));
  }

  let connections: Connection[] | undefined;
  if (raw.connections !== undefined && raw.connections !== null) {
    if (!Array.isArray(raw.connections)) {
      return { code: "invalid_document", message: `entity ${index}: connections must be a sequence` };
    }
    connections = raw.connections.filter(isRecord).map(parseConnection);
  }

  const sourceLump = optionalString(raw.sourceLump);

  return createEntity({
    properties,
    connections,
    parentContainerName: lumpName ?? sourceLump,
  });
}

function isLoadError(value: Entity | LoadError): value is LoadError {
  return "code" in value && "message" in value;
}

/**
 * Parse a lump document from its YAML/JSON content. `fallbackName` names
 * the container when the document does not.
 */
export function parseLumpDocument(content: string, fallbackName?: string): LoadResult {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { schema: yaml.JSON_SCHEMA });
  } catch (err: unknown) {
    if (err instanceof yaml.YAMLException) {
      return {
        error: {
          code: "invalid_yaml",
          message: err.message,
          line: err.mark?.line != null ? err.mark.line + 1 : undefined,
        },
      };
    }
    throw err;
  }

  if (parsed === null || parsed === undefined) {
    return { lump: { name: fallbackName, entities: [] } };
  }

  let name: string | undefined;
  let rawEntities: unknown;
  let isExport = false;

  if (Array.isArray(parsed)) {
    rawEntities = parsed;
  } else if (isRecord(parsed)) {
    name = optionalString(parsed.name);
    rawEntities = parsed.entities ?? [];
    isExport = "exportDate" in parsed;
  } else {
    return { error: { code: "invalid_document", message: "expected a mapping or a sequence at top level" } };
  }

  if (!Array.isArray(rawEntities)) {
    return { error: { code: "invalid_document", message: "entities must be a sequence" } };
  }

  // Exported documents record each entity's own source.
  const lumpName = name ?? (isExport ? undefined : fallbackName);

  const entities: Entity[] = [];
  for (let i = 0; i < rawEntities.length; i++) {
    const result = parseEntity(rawEntities[i], i, lumpName);
    if (isLoadError(result)) return { error: result };
    entities.push(result);
  }

  return { lump: { name: name ?? fallbackName, entities } };
}

/**
 * Load a lump document from a file path. The path names the container
 * when the document carries no name.
 */
export function loadLumpFile(filePath: string): LoadResult {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return { error: { code: "file_not_found", message: `file not found: ${filePath}` } };
    }
    if ((err as NodeJS.ErrnoException).code === "EACCES") {
      return { error: { code: "permission_denied", message: `permission denied: ${filePath}` } };
    }
    throw err;
  }

  const result = parseLumpDocument(content, filePath);
  if (result.error) {
    return { error: { ...result.error, message: `${filePath}: ${result.error.message}` } };
  }
  return result;
}

export interface LoadedCollection {
  entities: Entity[];
  lumps: EntityLump[];
}

/**
 * Load several lumps into one collection, in argument order. Stops at the
 * first file that fails.
 */
export function loadLumps(filePaths: readonly string[]): LoadedCollection {
  const lumps: EntityLump[] = [];
  const entities: Entity[] = [];

  for (const filePath of filePaths) {
    const result = loadLumpFile(filePath);
    if (result.error || !result.lump) {
      const error: LoadError = result.error ?? { code: "invalid_document", message: `${filePath}: no entities` };
      throw new LumpError(error.code, error.message);
    }
    lumps.push(result.lump);
    entities.push(...result.lump.entities);
  }

  return { entities, lumps };
}
