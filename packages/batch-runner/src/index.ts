import { fileURLToPath } from "node:url";
import { nanoid } from "nanoid";
import { createLogger, isBatchError, type Logger } from "@busco-tracker/shared";
import { aggregateCommand, planCommand, runCommand } from "./commands.js";
import { USAGE, parseCliOptions } from "./options.js";

export { aggregateCommand, githubOutputSink, planCommand, runCommand } from "./commands.js";
export type { CommandContext, OutputSink } from "./commands.js";
export { COMMANDS, USAGE, parseCliOptions } from "./options.js";
export type { CliOptions, Command } from "./options.js";

async function execute(args: string[], logger: Logger): Promise<void> {
  const options = parseCliOptions(args);
  switch (options.command) {
    case "plan":
      planCommand(options, { logger });
      return;
    case "run": {
      const summary = await runCommand(options, { logger });
      logger.info(
        { total: summary.total, succeeded: summary.succeeded, failed: summary.failed },
        "slice finished",
      );
      return;
    }
    case "aggregate":
      aggregateCommand(options, { logger });
      return;
    default:
      console.error(USAGE);
      process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const logger = createLogger("busco-batch").child({ run_id: `run_${nanoid(10)}` });
  try {
    await execute(process.argv.slice(2), logger);
  } catch (err) {
    if (isBatchError(err)) {
      logger.error({ code: err.code, details: err.details }, err.message);
    } else {
      logger.fatal({ err }, "unexpected failure");
    }
    process.exitCode = 1;
  }
}

const isEntrypoint = process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1];
if (isEntrypoint) {
  void main();
}
