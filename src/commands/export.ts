import { Command } from "commander";
import fs from "node:fs";
import chalk from "chalk";
import type { Entity } from "../entities/entity.js";
import { filterRows } from "../entities/filter.js";
import type { EntityRow } from "../entities/filter.js";
import { buildExport, isNonEmpty, parseExportFormat, serializeExport } from "../entities/export.js";
import { parseIndex, plural, reportError, splitList } from "../utils.js";
import { addFilterOptions, criteriaFromOptions, loadOrExit } from "./options.js";
import type { FilterOptions } from "./options.js";

interface ExportOptions extends FilterOptions {
  format: string;
  output?: string;
  select?: string;
}

/**
 * Narrow the filtered rows to the positions named by --select. Returns an
 * error message for a position outside the rows.
 */
export function selectRows(rows: readonly EntityRow[], select: string | undefined): Entity[] | string {
  const positions = splitList(select);
  if (!positions) return rows.map((row) => row.entity);

  const selected: Entity[] = [];
  for (const raw of positions) {
    const position = parseIndex(raw);
    if (position === undefined || position >= rows.length) {
      return `invalid selection: ${raw} (${plural(rows.length, "entity", "entities")} match)`;
    }
    selected.push(rows[position].entity);
  }
  return selected;
}

export function registerExport(program: Command): void {
  const command = program
    .command("export <files...>")
    .description("Export the selected entities to JSON, YAML or CSV");

  addFilterOptions(command)
    .option("-s, --select <positions>", "Positions within the filtered results (comma-separated)")
    .option("--format <format>", "Output format: json, yaml, csv", "json")
    .option("-o, --output <file>", "Output file (default: stdout)")
    .action((files: string[], opts: ExportOptions) => {
      const format = parseExportFormat(opts.format);
      if (!format) {
        reportError(undefined, "invalid_option", `invalid --format: ${opts.format}`);
      }

      const { entities } = loadOrExit(files, format);
      const rows = filterRows(entities, criteriaFromOptions(opts, format));

      const selection = selectRows(rows, opts.select);
      if (typeof selection === "string") {
        reportError(format, "invalid_option", selection);
      }

      if (!isNonEmpty(selection)) {
        console.error(chalk.yellow("No entities selected. Select one or more entities to export."));
        process.exit(1);
      }

      const output = serializeExport(buildExport(selection), format);

      if (opts.output) {
        try {
          fs.writeFileSync(opts.output, output);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          reportError(format, "write_failed", `error exporting entities: ${message}`);
        }
        console.log(chalk.green(`Exported ${plural(selection.length, "entity", "entities")} to ${opts.output}`));
      } else {
        process.stdout.write(output);
      }

      process.exit(0);
    });
}
