#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { validateCommand } from "./commands/validate.js";
import { explainCommand } from "./commands/explain.js";
import { promptCommand } from "./commands/prompt.js";
import { runCommands } from "./commands/run.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("relay")
  .description(chalk.dim("Run agent graphs against a validated permission snapshot."))
  .version(VERSION);

// ── validate ──
program
  .command("validate <file>")
  .description("Parse a snapshot file and check its graph invariants")
  .action(async (file: string) => {
    await validateCommand(file);
  });

// ── explain ──
program
  .command("explain <file>")
  .description("Show agents, tools, routes, policy and reachability")
  .action(async (file: string) => {
    await explainCommand(file);
  });

// ── prompt ──
program
  .command("prompt <file> <agent>")
  .description("Print the first-step prompt an agent would receive")
  .option("--input <text>", "User message")
  .action(async (file: string, agent: string, opts: { input?: string }) => {
    await promptCommand(file, agent, opts);
  });

// ── run ──
const run = program.command("run").description("Run a snapshot with a scripted list of decisions");
runCommands(run);

await program.parseAsync();
