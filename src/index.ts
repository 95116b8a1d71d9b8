/**
 * entlens — programmatic API.
 *
 * The CLI is a thin layer over these functions; hosts that render their own
 * grid or panels use them directly.
 */

export { Entity, createEntity, toPropertyValue, absent, scalar, sequence } from "./entities/entity.js";
export type { Connection, EntityInit, PropertyValue } from "./entities/entity.js";
export { normalize, displayValue, exportValue, matchText } from "./entities/value.js";
export type { ExportValue, NormalizedValue } from "./entities/value.js";
export {
  OBJECT_KINDS,
  criteria,
  emptyCriteria,
  filterEntities,
  filterRows,
  matchesCriteria,
  parseObjectKind,
} from "./entities/filter.js";
export type { EntityRow, FilterCriteria, ObjectKind } from "./entities/filter.js";
export {
  DEFAULT_EXPORT_FILE_NAME,
  buildExport,
  isNonEmpty,
  serializeExport,
} from "./entities/export.js";
export type {
  ExportDocument,
  ExportFormat,
  ExportedConnection,
  ExportedEntity,
  NonEmptyArray,
} from "./entities/export.js";
export {
  resolveByTargetName,
  findAllByTargetName,
  findReferrers,
  findBrokenConnections,
  resolveConnections,
} from "./entities/resolve.js";
export type { BrokenConnection, Referrer, ResolvedConnection } from "./entities/resolve.js";
export { describeEntity, panelTitle, selectEntity, canFocus } from "./entities/inspect.js";
export type { ConnectionRow, EntityDescription, PropertyRow } from "./entities/inspect.js";
export { parseLumpDocument, loadLumpFile, loadLumps, LumpError } from "./entities/loader.js";
export type { EntityLump, LoadError, LoadResult, LoadedCollection } from "./entities/loader.js";
export { formatRows } from "./entities/formatter.js";
export type { OutputFormat } from "./entities/formatter.js";
export { toOrderedJson, toOrderedYaml } from "./entities/serialize.js";
export type { OrderedValue } from "./entities/serialize.js";
