#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerFetchCommands } from "./modules/fetch.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  const version = typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "version") : undefined;
  return typeof version === "string" ? version : "0.0.0";
}

export function createProgram(): Command {
  const program = new Command()
    .name("albumdl")
    .description("Download image albums into numbered files, resuming where the last run stopped")
    .version(readVersion())
    .option("--json", "Print machine-readable JSON on stdout")
    .option("-q, --quiet", "No spinner or progress output")
    .option("--timeout <ms>", "Time allowed until a server answers, in ms")
    .option("--retry <n>", "Extra attempts for a failed request or transfer");

  registerFetchCommands(program);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
