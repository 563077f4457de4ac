import { isAbsolute, resolve } from "node:path";
import { Err, Ok, type Result } from "slang-ts";
import { z } from "zod";
import type { LoggerConfig } from "../logging/index.js";
import { validationError } from "../tasks/errors.js";
import type { TaskError } from "../tasks/types.js";

export const APP_NAME = "task-tracker";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const envSchema = z.object({
  TASK_TRACKER_FILE: z.string().min(1).default("tasks.json"),
  TASK_TRACKER_MODE: z.enum(["prod", "dev", "silent"]).default("prod"),
  TASK_TRACKER_LOG_DIR: z.string().min(1).default("logs"),
  TASK_TRACKER_LOG_CHUNKING: z
    .enum(["none", "daily", "weekly", "monthly"])
    .default("none"),
  TASK_TRACKER_DIAGNOSTICS: booleanFlag.default(false),
});

export type Env = Record<string, string | undefined>;

export interface ConfigOverrides {
  file?: string;
  diagnostics?: boolean;
}

export interface TrackerConfig {
  /** Absolute path of the task file */
  taskFile: string;
  logging: LoggerConfig;
  diagnostics: boolean;
}

/**
 * Resolves the tracker configuration from the environment.
 * CLI flags win over environment variables; relative paths resolve against cwd.
 */
export function loadConfig(
  env: Env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd()
): Result<TrackerConfig, TaskError> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return Err(validationError(`Invalid configuration: ${details}`));
  }

  const vars = parsed.data;
  const toAbsolute = (path: string) =>
    isAbsolute(path) ? path : resolve(cwd, path);

  return Ok({
    taskFile: toAbsolute(overrides.file ?? vars.TASK_TRACKER_FILE),
    logging: {
      logDir: toAbsolute(vars.TASK_TRACKER_LOG_DIR),
      mode: vars.TASK_TRACKER_MODE,
      chunking: vars.TASK_TRACKER_LOG_CHUNKING,
    },
    diagnostics: overrides.diagnostics ?? vars.TASK_TRACKER_DIAGNOSTICS,
  });
}
