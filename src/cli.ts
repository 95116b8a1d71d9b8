#!/usr/bin/env node

import { Command } from "commander";
import { createRequire } from "node:module";
import { registerQuery } from "./commands/query.js";
import { registerShow } from "./commands/show.js";
import { registerExport } from "./commands/export.js";
import { registerResolve } from "./commands/resolve.js";
import { registerLinks } from "./commands/links.js";
import { registerStats } from "./commands/stats.js";

const program = new Command();
const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version?: string };

program
  .name("entlens")
  .description("Filter, inspect and export map entities from entity lump documents")
  .version(pkg.version ?? "0.0.0");

registerQuery(program);
registerShow(program);
registerExport(program);
registerResolve(program);
registerLinks(program);
registerStats(program);

await program.parseAsync();
