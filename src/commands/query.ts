import { Command } from "commander";
import { filterRows } from "../entities/filter.js";
import { parseOutputFormat, printRows } from "../entities/formatter.js";
import { reportError } from "../utils.js";
import { addFilterOptions, criteriaFromOptions, loadOrExit } from "./options.js";
import type { FilterOptions } from "./options.js";

interface QueryOptions extends FilterOptions {
  format: string;
  count?: boolean;
  source?: boolean;
  limit?: number;
}

export function registerQuery(program: Command): void {
  const command = program
    .command("query <files...>")
    .description("List entities matching class, kind and key/value filters");

  addFilterOptions(command)
    .option("--format <format>", "Output format: table, json, jsonl, csv, yaml", "table")
    .option("--source", "Show the entity lump each entity came from")
    .option("--limit <n>", "Limit results", parseInt)
    .option("--count", "Only show the number of matches")
    .action((files: string[], opts: QueryOptions) => {
      const format = parseOutputFormat(opts.format);
      if (!format) {
        reportError(undefined, "invalid_option", `invalid --format: ${opts.format}`);
      }

      const filter = criteriaFromOptions(opts, format);
      const { entities } = loadOrExit(files, format);

      let rows = filterRows(entities, filter);

      if (opts.count) {
        console.log(String(rows.length));
        process.exit(0);
      }

      if (opts.limit !== undefined && Number.isInteger(opts.limit) && opts.limit >= 0) {
        rows = rows.slice(0, opts.limit);
      }

      printRows(rows, format, {
        totalCount: entities.length,
        showSource: opts.source ?? false,
      });

      process.exit(0);
    });
}
