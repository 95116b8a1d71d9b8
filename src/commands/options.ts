import { Command } from "commander";
import { criteria, parseObjectKind } from "../entities/filter.js";
import type { FilterCriteria } from "../entities/filter.js";
import { loadLumps, LumpError } from "../entities/loader.js";
import type { LoadedCollection } from "../entities/loader.js";
import { reportError } from "../utils.js";

export interface FilterOptions {
  class?: string;
  key?: string;
  value?: string;
  exact?: boolean;
  kind: string;
}

export function addFilterOptions(command: Command): Command {
  return command
    .option("-c, --class <text>", "Classname contains text (case-insensitive)")
    .option("-k, --key <text>", "Some property key contains text (case-insensitive)")
    .option("-v, --value <text>", "Some property value matches text")
    .option("--exact", "Match whole values exactly instead of by substring")
    .option("--kind <kind>", "Object kind: everything, mesh, point", "everything");
}

export function criteriaFromOptions(opts: FilterOptions, format?: string): FilterCriteria {
  const objectKind = parseObjectKind(opts.kind);
  if (!objectKind) {
    reportError(format, "invalid_option", `invalid --kind: ${opts.kind} (expected everything, mesh or point)`);
  }
  return criteria({
    objectKind,
    classFilter: opts.class ?? "",
    keyFilter: opts.key ?? "",
    valueFilter: opts.value ?? "",
    matchWholeValue: opts.exact ?? false,
  });
}

/** Load every lump named on the command line, or report the failure and exit. */
export function loadOrExit(files: string[], format?: string): LoadedCollection {
  try {
    return loadLumps(files);
  } catch (err) {
    if (err instanceof LumpError) {
      reportError(format, err.code, err.message);
    }
    const message = err instanceof Error ? err.message : String(err);
    reportError(format, "load_failed", message);
  }
}
