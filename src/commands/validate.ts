import chalk from "chalk";
import { validateSnapshot } from "../core/graph-validator.js";
import { snapshotChecksum } from "../core/snapshot.js";
import { fail, loadSnapshotForCli, printViolations } from "./snapshot-cli-utils.js";

export async function validateCommand(file: string): Promise<void> {
  let valid = false;
  try {
    const { snapshot, path } = loadSnapshotForCli(file);
    console.log(chalk.green("✓ Snapshot schema valid"));
    console.log(
      chalk.green(`✓ ${snapshot.agents.length} agents, ${snapshot.tools.length} tools, ${snapshot.routes.length} routes parsed`),
    );

    const result = validateSnapshot(snapshot);
    if (result.ok) {
      printViolations([], result.warnings);
      console.log(chalk.green(`✓ Graph valid (default agent: ${snapshot.default_agent_key ?? "none"})`));
      console.log(chalk.dim(`checksum: ${snapshotChecksum(snapshot)}`));
      valid = true;
    } else {
      printViolations(result.errors, result.warnings);
      console.error(chalk.red(`✗ ${result.errors.length} validation error${result.errors.length === 1 ? "" : "s"}`));
    }
    console.log(chalk.dim(`file: ${path}`));
  } catch (err) {
    fail(err);
  }
  if (!valid) process.exit(1);
}
