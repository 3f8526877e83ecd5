#!/usr/bin/env node

import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { runCommand } from "./commands/run.js";
import { readFileSync } from "fs";
import { join, dirname, basename } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

// 在 ES 模块中获取 __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// 动态读取版本号
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8")));

const program = new Command();

program
  .name(basename(process.argv[1] || "botwire"))
  .description("Long-polling chat bot runtime: filters, middleware, handlers")
  .version(packageJson.version, "-v, --version");

const check = program
  .command("check [path]")
  .description("Validate botwire.json (and .env placeholders) and print the resolved config")
  .action(checkCommand);

const run = program
  .command("run [path]")
  .description("Load the entry module from botwire.json and start polling")
  .action(runCommand);

// Default: `botwire` / `botwire .` => `botwire run [path]`
const firstArg = process.argv[2];
if (
  !firstArg ||
  (![check.name(), run.name(), "help"].includes(firstArg) &&
    !["--help", "-h", "-v", "--version"].includes(firstArg))
) {
  process.argv.splice(2, 0, "run");
}

program.parse();
