import { Command } from "commander";
import chalk from "chalk";
import type { Entity } from "../entities/entity.js";
import { connectionTree } from "../entities/export.js";
import { filterRows } from "../entities/filter.js";
import { canFocus, describeEntity, selectEntity } from "../entities/inspect.js";
import type { ConnectionRow } from "../entities/inspect.js";
import { resolveByTargetName } from "../entities/resolve.js";
import { toOrderedJson, toOrderedYaml } from "../entities/serialize.js";
import type { OrderedValue } from "../entities/serialize.js";
import { parseIndex, reportError } from "../utils.js";
import { addFilterOptions, criteriaFromOptions, loadOrExit } from "./options.js";
import type { FilterOptions } from "./options.js";

interface ShowOptions extends FilterOptions {
  format: string;
  index?: string;
  name?: string;
}

export const SHOW_FORMATS = ["text", "json", "yaml"] as const;

export type ShowFormat = (typeof SHOW_FORMATS)[number];

export function parseShowFormat(text: string): ShowFormat | undefined {
  return SHOW_FORMATS.find((f) => f === text.toLowerCase());
}

function describeForOutput(entity: Entity, index: number): OrderedValue {
  const description = describeEntity(entity);
  const tree = new Map<string, OrderedValue>([
    ["index", index],
    ["title", description.title],
    ["classname", entity.classname],
    ["targetname", entity.targetname],
  ]);
  if (description.source !== undefined) tree.set("source", description.source);
  tree.set("focusable", canFocus(entity));
  tree.set("properties", new Map(description.properties.map((p): [string, string] => [p.key, p.value])));
  tree.set("connections", description.connections.map(connectionTree));
  return tree;
}

function formatConnection(c: ConnectionRow): string {
  const param = c.parameter !== "" ? `(${c.parameter})` : "";
  const delay = c.delay !== 0 ? ` ${chalk.dim(`delay ${c.delay}`)}` : "";
  const times = c.timesToFire !== -1 && c.timesToFire !== 0 ? ` ${chalk.dim(`x${c.timesToFire}`)}` : "";
  return `${c.output} → ${chalk.cyan(c.target)}.${c.input}${param}${delay}${times}`;
}

/**
 * Print an entity the way a properties panel shows it: title, property
 * rows, then the outputs.
 */
export function printEntity(entity: Entity, index: number, format: ShowFormat): void {
  switch (format) {
    case "json":
      console.log(toOrderedJson(describeForOutput(entity, index)));
      break;

    case "yaml":
      console.log(toOrderedYaml(describeForOutput(entity, index)).trimEnd());
      break;

    case "text":
    default: {
      const description = describeEntity(entity);
      console.log(chalk.bold(description.title));
      console.log(`${chalk.dim("index:")} ${index}`);
      console.log();

      if (description.properties.length > 0) {
        const maxLen = Math.max(...description.properties.map((p) => p.key.length));
        for (const p of description.properties) {
          console.log(`  ${chalk.cyan(p.key.padEnd(maxLen))}  ${p.value}`);
        }
      } else {
        console.log(chalk.dim("  (no properties)"));
      }

      if (description.hasOutputs) {
        console.log();
        console.log(chalk.dim("outputs:"));
        for (const c of description.connections) {
          console.log(`  ${formatConnection(c)}`);
        }
      }
      break;
    }
  }
}

export function registerShow(program: Command): void {
  const command = program
    .command("show <files...>")
    .description("Show one entity's properties and outputs");

  addFilterOptions(command)
    .option("-i, --index <n>", "Position of the entity in the collection")
    .option("-n, --name <targetname>", "Targetname of the entity")
    .option("--format <format>", "Output format: text, json, yaml", "text")
    .action((files: string[], opts: ShowOptions) => {
      const format = parseShowFormat(opts.format);
      if (!format) {
        reportError(undefined, "invalid_option", `invalid --format: ${opts.format}`);
      }

      const { entities } = loadOrExit(files, format);

      if (opts.index !== undefined) {
        const index = parseIndex(opts.index);
        if (index === undefined) {
          reportError(format, "invalid_option", `invalid --index: ${opts.index}`);
        }
        if (index >= entities.length) {
          reportError(format, "not_found", `no entity at index ${index} (collection has ${entities.length})`);
        }
        printEntity(entities[index], index, format);
        process.exit(0);
      }

      if (opts.name !== undefined) {
        const entity = resolveByTargetName(entities, opts.name);
        if (!entity) {
          reportError(format, "not_found", `no entity named "${opts.name}"`);
        }
        printEntity(entity, entities.indexOf(entity), format);
        process.exit(0);
      }

      const rows = filterRows(entities, criteriaFromOptions(opts, format));
      const selected = selectEntity(rows);
      if (!selected) {
        reportError(format, "not_found", "no entities match");
      }
      printEntity(selected, rows[0].index, format);
      process.exit(0);
    });
}
