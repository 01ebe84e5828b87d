import { buildContext, renderPrompt } from "../core/context-builder.js";
import { createExecutionLog } from "../core/execution-log.js";
import { createToolLog } from "../core/tool-log.js";
import { fail, loadSnapshotForCli } from "./snapshot-cli-utils.js";

export async function promptCommand(file: string, agentKey: string, opts: { input?: string }): Promise<void> {
  try {
    const { snapshot } = loadSnapshotForCli(file);
    const context = buildContext({
      snapshot,
      agentKey,
      executionLog: createExecutionLog({ previewPolicy: snapshot.execution_log }),
      toolLog: createToolLog(),
      userInput: opts.input ?? "",
    });
    console.log(renderPrompt(context));
  } catch (err) {
    fail(err);
  }
}
