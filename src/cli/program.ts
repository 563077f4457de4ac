import { Command, CommanderError } from "commander";
import { APP_NAME, type Env, loadConfig } from "../config/config.js";
import { createEngine } from "../engine/engine.js";
import { createLogger, resolveLogPath } from "../logging/index.js";
import { services } from "../services/services.config.js";
import { createTaskFile } from "../tasks/task-file.js";
import { createTaskStore } from "../tasks/task-store.js";
import type { TaskError } from "../tasks/types.js";
import { printOutcome } from "./format.js";
import { type CliOutput, createCliOutput } from "./utils/log.js";

export const VERSION = "1.0.0";

export interface RunCliOptions {
  env?: Env;
  cwd?: string;
  clock?: () => Date;
  output?: CliOutput;
}

interface GlobalOptions {
  file?: string;
  diagnostics?: boolean;
}

/** Lowercases the command verb so `ADD` and `List` match their commands */
const lowercaseVerb = (argv: string[]): string[] => {
  const args = [...argv];
  for (let index = 2; index < args.length; index++) {
    const arg = args[index];
    if (arg === undefined) {
      break;
    }
    if (arg === "-f" || arg === "--file") {
      index++;
      continue;
    }
    if (arg.startsWith("-")) {
      continue;
    }
    args[index] = arg.toLowerCase();
    break;
  }
  return args;
};

/**
 * Parses argv, runs the matching tasks action and prints its outcome.
 * @returns The process exit code
 */
export function runCli(argv: string[], options: RunCliOptions = {}): number {
  const output = options.output ?? createCliOutput();
  const env = options.env ?? process.env;
  let exitCode = 0;

  const program = new Command();

  program
    .name("task-cli")
    .description("Track tasks in a local JSON file")
    .version(VERSION)
    .option(
      "-f, --file <path>",
      "task file (default: $TASK_TRACKER_FILE or ./tasks.json)"
    )
    .option("--diagnostics", "print engine diagnostics")
    .exitOverride()
    .configureOutput({
      writeOut: output.writeOut,
      writeErr: output.writeErr,
    });

  const reportError = (error: TaskError, logFile: string | null) => {
    output.error(error.message);
    if (error.logId && logFile) {
      output.hint(`Log id ${error.logId} in ${logFile}`);
    }
  };

  /** One scoped use of the task file: load, run the action, save, report */
  const run = (actionName: string, payload: Record<string, unknown>) => {
    const globals = program.opts<GlobalOptions>();
    const configResult = loadConfig(
      env,
      { file: globals.file, diagnostics: globals.diagnostics },
      options.cwd
    );
    if (configResult.isErr) {
      reportError(configResult.error, null);
      exitCode = 1;
      return;
    }
    const config = configResult.value;

    const logger = createLogger(APP_NAME, config.logging);
    const store = createTaskStore({
      file: createTaskFile({ path: config.taskFile, logger }),
      clock: options.clock,
      diagnostics: config.diagnostics,
      logger,
    });
    const engine = createEngine({
      services,
      diagnostics: config.diagnostics,
      logger,
    });

    const result = engine.executeAction("tasks", actionName, payload, {
      store,
      logger,
    });
    if (result.isErr) {
      const logFile =
        config.logging.mode === "prod"
          ? resolveLogPath(APP_NAME, config.logging)
          : null;
      reportError(result.error, logFile);
      exitCode = 1;
      return;
    }

    printOutcome(output, result.value);
  };

  program
    .command("add")
    .argument("<description>", "what needs doing")
    .description("Add a new task")
    .action((description: string) => run("add", { description }));

  program
    .command("update")
    .argument("<id>", "task ID")
    .argument("<description>", "new description")
    .description("Replace the description of a task")
    .action((id: string, description: string) =>
      run("update", { id, description })
    );

  program
    .command("delete")
    .argument("<id>", "task ID")
    .description("Delete a task")
    .action((id: string) => run("delete", { id }));

  program
    .command("mark-in-progress")
    .argument("<id>", "task ID")
    .description("Mark a task as in progress")
    .action((id: string) => run("mark", { id, status: "in-progress" }));

  program
    .command("mark-done")
    .argument("<id>", "task ID")
    .description("Mark a task as done")
    .action((id: string) => run("mark", { id, status: "done" }));

  program
    .command("mark-todo")
    .argument("<id>", "task ID")
    .description("Move a task back to todo")
    .action((id: string) => run("mark", { id, status: "todo" }));

  program
    .command("mark")
    .argument("<id>", "task ID")
    .argument("<status>", "todo, in-progress or done")
    .description("Set the status of a task")
    .action((id: string, status: string) =>
      run("mark", { id, status: status.toLowerCase() })
    );

  program
    .command("list")
    .argument("[status]", "todo, in-progress, done or all")
    .description("List tasks, optionally only those with one status")
    .action((status: string | undefined) =>
      run("list", { status: status?.toLowerCase() })
    );

  program
    .command("show")
    .argument("<id>", "task ID")
    .description("Show a single task")
    .action((id: string) => run("get", { id }));

  try {
    program.parse(lowercaseVerb(argv));
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
