import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { Ok, type Result } from "slang-ts";
import { prettifyError, z } from "zod";
import type { TrackerLogger } from "../logging/index.js";
import { handleError, safeTrySync } from "../utils/index.js";
import { nextTaskId } from "./next-id.js";
import {
  TASK_STATUSES,
  type Task,
  type TaskError,
  type TaskFile,
  type TaskSnapshot,
} from "./types.js";

const timestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid timestamp");

export const taskSchema = z.object({
  id: z.number().int().positive(),
  description: z.string(),
  status: z.enum(TASK_STATUSES),
  createdAt: timestampSchema,
  updatedAt: timestampSchema,
});

const taskListSchema = z
  .array(taskSchema)
  .refine(
    (tasks) => new Set(tasks.map((task) => task.id)).size === tasks.length,
    "Task ids must be unique"
  );

/** Current format, or the bare array written by earlier versions */
export const taskFileSchema = z.union([
  z.object({
    nextId: z.number().int().positive(),
    tasks: taskListSchema,
  }),
  taskListSchema,
]);

export interface TaskFileOptions {
  path: string;
  logger: TrackerLogger;
}

const EMPTY_CONTENT = /^\s*$/;

/** Field order of every task written to disk */
const serializeTask = (task: Task): Task => ({
  id: task.id,
  description: task.description,
  status: task.status,
  createdAt: task.createdAt,
  updatedAt: task.updatedAt,
});

/**
 * JSON file holding the whole task collection.
 * A missing or blank file reads as an empty collection. Saves go through a
 * sibling temp file renamed over the target.
 */
export function createTaskFile(options: TaskFileOptions): TaskFile {
  const { path, logger } = options;

  const load = (): Result<TaskSnapshot, TaskError> => {
    if (!existsSync(path)) {
      return Ok({ nextId: 1, tasks: [] });
    }

    const read = safeTrySync(() => readFileSync(path, "utf-8"));
    if (read.isErr) {
      return handleError({
        message: `Could not read task file ${path}`,
        data: { path, error: String(read.error) },
        logger,
        atFunction: "taskFile.load",
      });
    }

    const content = read.value;
    if (EMPTY_CONTENT.test(content)) {
      return Ok({ nextId: 1, tasks: [] });
    }

    const parsedJson = safeTrySync<unknown>(() => JSON.parse(content));
    if (parsedJson.isErr) {
      return handleError({
        message: `Task file ${path} is not valid JSON`,
        data: { path, error: String(parsedJson.error) },
        logger,
        atFunction: "taskFile.load",
      });
    }

    const parsed = taskFileSchema.safeParse(parsedJson.value);
    if (!parsed.success) {
      return handleError({
        message: `Task file ${path} has an invalid format`,
        data: { path, error: prettifyError(parsed.error) },
        logger,
        atFunction: "taskFile.load",
      });
    }

    const contents = parsed.data;
    if (Array.isArray(contents)) {
      return Ok({ nextId: nextTaskId(contents), tasks: contents });
    }
    return Ok({
      nextId: nextTaskId(contents.tasks, contents.nextId),
      tasks: contents.tasks,
    });
  };

  const save = (snapshot: TaskSnapshot): Result<true, TaskError> => {
    const body = `${JSON.stringify(
      { nextId: snapshot.nextId, tasks: snapshot.tasks.map(serializeTask) },
      null,
      4
    )}\n`;
    const tempPath = `${path}.tmp`;

    const written = safeTrySync(() => {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(tempPath, body, "utf-8");
      renameSync(tempPath, path);
    });
    if (written.isErr) {
      return handleError({
        message: `Could not save tasks to ${path}`,
        data: { path, error: String(written.error) },
        logger,
        atFunction: "taskFile.save",
      });
    }

    return Ok(true);
  };

  return { path, load, save };
}
