import { Command } from "commander";
import chalk from "chalk";
import type { Entity } from "../entities/entity.js";
import { exportConnection } from "../entities/export.js";
import {
  findBrokenConnections,
  findReferrers,
  isKeywordTarget,
  resolveByTargetName,
  resolveConnections,
} from "../entities/resolve.js";
import { plural, reportError } from "../utils.js";
import { loadOrExit } from "./options.js";

interface LinksOptions {
  format: string;
}

function label(entity: Entity): string {
  return entity.targetname !== "" ? entity.targetname : `(${entity.classname || "unnamed"})`;
}

function checkFormat(format: string): "text" | "json" {
  if (format === "text" || format === "json") return format;
  reportError(undefined, "invalid_option", `invalid --format: ${format}`);
}

function findNamedOrExit(entities: Entity[], name: string, format: string): Entity {
  const entity = resolveByTargetName(entities, name);
  if (!entity) {
    reportError(format, "not_found", `no entity named "${name}"`);
  }
  return entity;
}

export function registerLinks(program: Command): void {
  const links = program
    .command("links")
    .description("Follow entity I/O connections");

  links
    .command("outputs <name> <files...>")
    .description("List an entity's outputs and the entities they target")
    .option("--format <format>", "Output format: text, json", "text")
    .action((name: string, files: string[], opts: LinksOptions) => {
      const format = checkFormat(opts.format);
      const { entities } = loadOrExit(files, format);
      const entity = findNamedOrExit(entities, name, format);

      const resolved = resolveConnections(entities, entity);

      if (format === "json") {
        console.log(JSON.stringify({
          name,
          outputs: resolved.map(({ connection, target }) => ({
            ...exportConnection(connection),
            resolved: target !== undefined,
            ...(target !== undefined ? { targetIndex: entities.indexOf(target) } : {}),
          })),
          count: resolved.length,
        }, null, 2));
      } else if (resolved.length === 0) {
        console.log(chalk.dim(`No outputs from ${name}`));
      } else {
        console.log(chalk.bold(`${plural(resolved.length, "output")} from ${name}:`));
        for (const { connection, target } of resolved) {
          const row = exportConnection(connection);
          const targetText = target !== undefined || isKeywordTarget(row.target)
            ? chalk.cyan(row.target)
            : chalk.red(row.target);
          console.log(`  ${row.output} → ${targetText}.${row.input}`);
        }
      }
      process.exit(0);
    });

  links
    .command("inputs <name> <files...>")
    .description("List the entities whose outputs target the given entity")
    .option("--format <format>", "Output format: text, json", "text")
    .action((name: string, files: string[], opts: LinksOptions) => {
      const format = checkFormat(opts.format);
      const { entities } = loadOrExit(files, format);
      const entity = findNamedOrExit(entities, name, format);

      const referrers = findReferrers(entities, entity);

      if (format === "json") {
        console.log(JSON.stringify({
          name,
          inputs: referrers.map(({ entity: source, connection }) => ({
            sourceIndex: entities.indexOf(source),
            source: source.targetname,
            classname: source.classname,
            ...exportConnection(connection),
          })),
          count: referrers.length,
        }, null, 2));
      } else if (referrers.length === 0) {
        console.log(chalk.dim(`No inputs to ${name}`));
      } else {
        console.log(chalk.bold(`${plural(referrers.length, "input")} to ${name}:`));
        for (const { entity: source, connection } of referrers) {
          const row = exportConnection(connection);
          console.log(`  ${label(source)}.${row.output} → ${row.input}`);
        }
      }
      process.exit(0);
    });

  links
    .command("broken <files...>")
    .description("Find outputs whose target names no entity")
    .option("--format <format>", "Output format: text, json", "text")
    .action((files: string[], opts: LinksOptions) => {
      const format = checkFormat(opts.format);
      const { entities } = loadOrExit(files, format);

      const broken = findBrokenConnections(entities);

      if (format === "json") {
        console.log(JSON.stringify({
          broken: broken.map((b) => ({
            sourceIndex: b.sourceIndex,
            source: b.source.targetname,
            classname: b.source.classname,
            output: b.connection.outputName ?? "",
            target: b.targetName,
          })),
          count: broken.length,
        }, null, 2));
      } else if (broken.length === 0) {
        console.log(chalk.green("No broken connections"));
      } else {
        console.log(chalk.bold(`${plural(broken.length, "broken connection")}:`));
        for (const b of broken) {
          console.log(`  ${label(b.source)}.${b.connection.outputName ?? ""} → ${chalk.red(b.targetName)}`);
        }
      }
      process.exit(0);
    });
}
