import { Err, Ok, type Result } from "slang-ts";
import type { TrackerLogger } from "../logging/index.js";
import { createDiagnosticsLog } from "../utils/index.js";
import { invalidStatusError, notFoundError, validationError } from "./errors.js";
import { nextTaskId } from "./next-id.js";
import {
  TASK_STATUSES,
  type Task,
  type TaskError,
  type TaskFile,
  type TaskSnapshot,
  type TaskStatus,
} from "./types.js";

export interface TaskStoreOptions {
  /** Where the collection is loaded from and saved to */
  file: TaskFile;
  clock?: () => Date;
  diagnostics?: boolean;
  logger?: TrackerLogger;
}

export interface TaskStore {
  add: (description: string) => Result<number, TaskError>;
  update: (id: number, description: string) => Result<Task, TaskError>;
  delete: (id: number) => Result<Task, TaskError>;
  mark: (id: number, status: string) => Result<Task, TaskError>;
  list: (filter?: string) => Result<Task[], TaskError>;
  get: (id: number) => Result<Task, TaskError>;
}

export const isTaskStatus = (value: string): value is TaskStatus =>
  TASK_STATUSES.some((status) => status === value);

const checkDescription = (description: string): Result<true, TaskError> =>
  description.trim()
    ? Ok(true)
    : Err(validationError("Task description must not be empty"));

/**
 * Creates the task store over a task file.
 * Every operation loads the whole file; mutations write it back only when
 * they succeed.
 */
export function createTaskStore(options: TaskStoreOptions): TaskStore {
  const { file } = options;
  const clock = options.clock ?? (() => new Date());
  const log = createDiagnosticsLog("TaskStore", {
    diagnostics: options.diagnostics,
    logger: options.logger,
  });

  /** updatedAt never precedes createdAt, even when the clock steps back */
  const touch = (task: Task) => {
    const now = clock();
    task.updatedAt =
      now.getTime() < Date.parse(task.createdAt)
        ? task.createdAt
        : now.toISOString();
  };

  const findTask = (
    snapshot: TaskSnapshot,
    id: number
  ): Result<Task, TaskError> => {
    const task = snapshot.tasks.find((candidate) => candidate.id === id);
    return task ? Ok(task) : Err(notFoundError(id));
  };

  const read = (): Result<TaskSnapshot, TaskError> => {
    const loaded = file.load();
    if (loaded.isOk) {
      log(`Loaded ${loaded.value.tasks.length} task(s) from ${file.path}`);
    }
    return loaded;
  };

  const withSnapshot = <T>(
    mutate: (snapshot: TaskSnapshot) => Result<T, TaskError>
  ): Result<T, TaskError> => {
    const loaded = read();
    if (loaded.isErr) {
      return Err(loaded.error);
    }
    const snapshot = loaded.value;

    const outcome = mutate(snapshot);
    if (outcome.isErr) {
      return Err(outcome.error);
    }

    const saved = file.save(snapshot);
    if (saved.isErr) {
      return Err(saved.error);
    }
    log(`Saved ${snapshot.tasks.length} task(s) to ${file.path}`);

    return Ok(outcome.value);
  };

  const add = (description: string): Result<number, TaskError> => {
    const checked = checkDescription(description);
    if (checked.isErr) {
      return Err(checked.error);
    }

    return withSnapshot((snapshot): Result<number, TaskError> => {
      const id = nextTaskId(snapshot.tasks, snapshot.nextId);
      const now = clock().toISOString();
      snapshot.tasks.push({
        id,
        description,
        status: "todo",
        createdAt: now,
        updatedAt: now,
      });
      snapshot.nextId = id + 1;
      return Ok(id);
    });
  };

  const update = (
    id: number,
    description: string
  ): Result<Task, TaskError> => {
    const checked = checkDescription(description);
    if (checked.isErr) {
      return Err(checked.error);
    }

    return withSnapshot((snapshot): Result<Task, TaskError> => {
      const found = findTask(snapshot, id);
      if (found.isErr) {
        return Err(found.error);
      }
      const task = found.value;
      task.description = description;
      touch(task);
      return Ok({ ...task });
    });
  };

  const remove = (id: number): Result<Task, TaskError> =>
    withSnapshot((snapshot): Result<Task, TaskError> => {
      const index = snapshot.tasks.findIndex((task) => task.id === id);
      const [removed] = index === -1 ? [] : snapshot.tasks.splice(index, 1);
      return removed ? Ok(removed) : Err(notFoundError(id));
    });

  const mark = (id: number, status: string): Result<Task, TaskError> => {
    if (!isTaskStatus(status)) {
      return Err(invalidStatusError(status));
    }
    const nextStatus: TaskStatus = status;

    return withSnapshot((snapshot): Result<Task, TaskError> => {
      const found = findTask(snapshot, id);
      if (found.isErr) {
        return Err(found.error);
      }
      const task = found.value;
      task.status = nextStatus;
      touch(task);
      return Ok({ ...task });
    });
  };

  const list = (filter?: string): Result<Task[], TaskError> => {
    if (filter !== undefined && filter !== "all" && !isTaskStatus(filter)) {
      return Err(invalidStatusError(filter));
    }

    const loaded = read();
    if (loaded.isErr) {
      return Err(loaded.error);
    }

    const { tasks } = loaded.value;
    if (filter === undefined || filter === "all") {
      return Ok(tasks);
    }
    return Ok(tasks.filter((task) => task.status === filter));
  };

  const get = (id: number): Result<Task, TaskError> => {
    const loaded = read();
    if (loaded.isErr) {
      return Err(loaded.error);
    }
    return findTask(loaded.value, id);
  };

  return { add, update, delete: remove, mark, list, get };
}
