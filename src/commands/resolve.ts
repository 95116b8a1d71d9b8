import { Command } from "commander";
import chalk from "chalk";
import { findAllByTargetName, resolveByTargetName } from "../entities/resolve.js";
import { reportError } from "../utils.js";
import { loadOrExit } from "./options.js";
import { parseShowFormat, printEntity } from "./show.js";

interface ResolveOptions {
  format: string;
}

export function registerResolve(program: Command): void {
  program
    .command("resolve <name> <files...>")
    .description("Jump to the entity a connection target names")
    .option("--format <format>", "Output format: text, json, yaml", "text")
    .action((name: string, files: string[], opts: ResolveOptions) => {
      const format = parseShowFormat(opts.format);
      if (!format) {
        reportError(undefined, "invalid_option", `invalid --format: ${opts.format}`);
      }
      if (name === "") {
        reportError(format, "invalid_option", "target name cannot be empty");
      }

      const { entities } = loadOrExit(files, format);

      // Filters never apply here: a target may be hidden by the current view.
      const entity = resolveByTargetName(entities, name);
      if (!entity) {
        reportError(format, "not_found", `no entity named "${name}"`);
      }

      const count = findAllByTargetName(entities, name).length;
      if (count > 1) {
        console.error(chalk.yellow(`warn: ${count} entities are named "${name}", showing the first`));
      }

      printEntity(entity, entities.indexOf(entity), format);
      process.exit(0);
    });
}
