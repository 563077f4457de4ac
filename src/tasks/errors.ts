import { TASK_STATUSES, type TaskError } from "./types.js";

export const notFoundError = (id: number): TaskError => ({
  kind: "NotFoundError",
  message: `Task with ID ${id} not found`,
  data: { id },
});

export const validationError = (message: string, data?: unknown): TaskError => ({
  kind: "ValidationError",
  message,
  data,
});

export const invalidStatusError = (status: string): TaskError => ({
  kind: "InvalidStatusError",
  message: `Invalid status '${status}'. Use ${TASK_STATUSES.map((s) => `'${s}'`).join(", ")}`,
  data: { status },
});
