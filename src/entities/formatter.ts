/**
 * Output formatters for filter results.
 */

import chalk from "chalk";
import Table from "cli-table3";
import * as yaml from "js-yaml";
import { stringify } from "csv-stringify/sync";
import type { EntityRow } from "./filter.js";

export type OutputFormat = "table" | "json" | "jsonl" | "csv" | "yaml";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json", "jsonl", "csv", "yaml"];

export interface PrintOptions {
  /** Size of the collection the rows were filtered from. */
  totalCount: number;
  /** Add the container column. */
  showSource?: boolean;
}

export function parseOutputFormat(text: string): OutputFormat | undefined {
  return OUTPUT_FORMATS.find((f) => f === text.toLowerCase());
}

export interface RowObject {
  index: number;
  classname: string;
  targetname: string;
  source?: string;
}

export function rowToObject(row: EntityRow, showSource = false): RowObject {
  const obj: RowObject = {
    index: row.index,
    classname: row.classname,
    targetname: row.targetname,
  };
  if (showSource) {
    obj.source = row.entity.parentContainerName ?? "";
  }
  return obj;
}

/**
 * Render rows to a string in the given format. Machine formats carry no
 * colour.
 */
export function formatRows(rows: readonly EntityRow[], format: OutputFormat, opts: PrintOptions): string {
  const showSource = opts.showSource ?? false;
  const objects = rows.map((row) => rowToObject(row, showSource));

  switch (format) {
    case "json":
      return JSON.stringify(
        {
          results: objects,
          meta: { total_count: opts.totalCount, matched_count: rows.length },
        },
        null,
        2,
      );
    case "jsonl":
      return objects.map((obj) => JSON.stringify(obj)).join("\n");
    case "yaml":
      return yaml
        .dump(
          { results: objects, meta: { total_count: opts.totalCount, matched_count: rows.length } },
          { lineWidth: -1, noRefs: true },
        )
        .trimEnd();
    case "csv": {
      const header = ["index", "classname", "targetname", ...(showSource ? ["source"] : [])];
      const records = objects.map((obj) => [
        String(obj.index),
        obj.classname,
        obj.targetname,
        ...(showSource ? [obj.source ?? ""] : []),
      ]);
      return stringify([header, ...records]).trimEnd();
    }
    case "table":
    default:
      return formatTable(objects, showSource);
  }
}

function formatTable(objects: RowObject[], showSource: boolean): string {
  const head = ["#", "classname", "targetname", ...(showSource ? ["source"] : [])];
  const table = new Table({
    head: head.map((h) => chalk.bold(h)),
    style: { head: [], border: [] },
  });

  for (const obj of objects) {
    table.push([
      String(obj.index),
      obj.classname,
      obj.targetname,
      ...(showSource ? [obj.source ?? ""] : []),
    ]);
  }

  return table.toString();
}

export function printRows(rows: readonly EntityRow[], format: OutputFormat, opts: PrintOptions): void {
  if (rows.length === 0 && format === "table") {
    console.error(chalk.dim("No entities match"));
    return;
  }
  if (rows.length === 0 && format === "jsonl") {
    return;
  }

  console.log(formatRows(rows, format, opts));

  if (format === "table" && rows.length < opts.totalCount) {
    console.log(chalk.dim(`Showing ${rows.length} of ${opts.totalCount} entities`));
  }
}
