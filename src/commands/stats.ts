import { Command } from "commander";
import chalk from "chalk";
import type { Entity } from "../entities/entity.js";
import { findBrokenConnections } from "../entities/resolve.js";
import { reportError } from "../utils.js";
import { loadOrExit } from "./options.js";

export interface StatsResult {
  total_entities: number;
  lumps: number;
  mesh_entities: number;
  point_entities: number;
  by_classname: Record<string, number>;
  with_outputs: number;
  connections: number;
  broken_connections: number;
  duplicate_targetnames: Record<string, number>;
}

export function collectStats(entities: readonly Entity[], lumpCount: number): StatsResult {
  const byClassname = new Map<string, number>();
  const targetnameCounts = new Map<string, number>();
  let mesh = 0;
  let withOutputs = 0;
  let connections = 0;

  for (const entity of entities) {
    if (entity.isMeshEntity) mesh++;

    const classname = entity.classname || "(none)";
    byClassname.set(classname, (byClassname.get(classname) ?? 0) + 1);

    if (entity.targetname !== "") {
      targetnameCounts.set(entity.targetname, (targetnameCounts.get(entity.targetname) ?? 0) + 1);
    }

    if (entity.outputs.length > 0) withOutputs++;
    connections += entity.outputs.length;
  }

  const duplicates: Record<string, number> = {};
  for (const [name, count] of [...targetnameCounts].sort(([a], [b]) => a.localeCompare(b))) {
    if (count > 1) duplicates[name] = count;
  }

  // Most common classnames first
  const sortedByClassname = Object.fromEntries(
    [...byClassname].sort(([a, x], [b, y]) => y - x || a.localeCompare(b)),
  );

  return {
    total_entities: entities.length,
    lumps: lumpCount,
    mesh_entities: mesh,
    point_entities: entities.length - mesh,
    by_classname: sortedByClassname,
    with_outputs: withOutputs,
    connections,
    broken_connections: findBrokenConnections(entities).length,
    duplicate_targetnames: duplicates,
  };
}

export function registerStats(program: Command): void {
  program
    .command("stats <files...>")
    .description("Collection overview: entity counts, classnames, connection health")
    .option("--format <format>", "Output format: text, json", "text")
    .action((files: string[], opts: { format: string }) => {
      if (opts.format !== "text" && opts.format !== "json") {
        reportError(undefined, "invalid_option", `invalid --format: ${opts.format}`);
      }

      const { entities, lumps } = loadOrExit(files, opts.format);
      const result = collectStats(entities, lumps.length);

      if (opts.format === "json") {
        console.log(JSON.stringify(result, null, 2));
        process.exit(0);
      }

      console.log(chalk.bold("Entity Stats"));
      console.log();
      console.log(`  ${chalk.dim("Entities:")}     ${result.total_entities}`);
      console.log(`  ${chalk.dim("Lumps:")}        ${result.lumps}`);
      console.log(`  ${chalk.dim("Mesh:")}         ${result.mesh_entities}`);
      console.log(`  ${chalk.dim("Point:")}        ${result.point_entities}`);
      console.log(`  ${chalk.dim("With outputs:")} ${result.with_outputs}`);
      console.log(`  ${chalk.dim("Connections:")}  ${result.connections}`);
      console.log(`  ${chalk.dim("Broken:")}       ${result.broken_connections}`);

      const classnames = Object.entries(result.by_classname);
      if (classnames.length > 0) {
        console.log();
        console.log(chalk.bold("By classname"));
        const maxLen = Math.max(...classnames.map(([name]) => name.length));
        for (const [name, count] of classnames) {
          console.log(`  ${name.padEnd(maxLen)}  ${count}`);
        }
      }

      const duplicates = Object.entries(result.duplicate_targetnames);
      if (duplicates.length > 0) {
        console.log();
        console.log(chalk.yellow("Shared targetnames"));
        for (const [name, count] of duplicates) {
          console.log(`  ${name}  ${count}`);
        }
      }

      process.exit(0);
    });
}
