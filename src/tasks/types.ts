import type { Result } from "slang-ts";

export const TASK_STATUSES = ["todo", "in-progress", "done"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface Task {
  id: number;
  description: string;
  status: TaskStatus;
  /** ISO-8601, kept exactly as written */
  createdAt: string;
  updatedAt: string;
}

/** One loaded copy of the task file */
export interface TaskSnapshot {
  nextId: number;
  tasks: Task[];
}

export type TaskErrorKind =
  | "NotFoundError"
  | "ValidationError"
  | "InvalidStatusError"
  | "StorageError"
  | "InternalError";

export interface TaskError {
  kind: TaskErrorKind;
  message: string;
  /** Present when the error was written to the log */
  logId?: string;
  data?: unknown;
}

/** Load/save boundary of the store. The whole file is read and written at once. */
export interface TaskFile {
  readonly path: string;
  load: () => Result<TaskSnapshot, TaskError>;
  save: (snapshot: TaskSnapshot) => Result<true, TaskError>;
}
