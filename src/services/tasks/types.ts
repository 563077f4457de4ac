import { z } from "zod";
import type { Task } from "../../tasks/types.js";

/** What a tasks action hands back to the command layer */
export type TaskOutcome =
  | { kind: "added"; id: number }
  | { kind: "updated"; task: Task }
  | { kind: "deleted"; task: Task }
  | { kind: "marked"; task: Task }
  | { kind: "found"; task: Task }
  | {
      kind: "listed";
      tasks: Task[];
      filter: string | null;
      /** The file holds no tasks at all, whatever the filter */
      storeEmpty: boolean;
    };

const DECIMAL = /^-?\d+(\.\d+)?$/;
const WHOLE = /^-?\d+$/;

/**
 * Ids arrive as CLI strings and must be plain decimal digits:
 * hex, binary, exponent and trailing-dot forms are rejected.
 */
export const taskIdSchema = z.preprocess(
  (value) => (typeof value === "number" ? String(value) : value),
  z
    .string({ error: "Task ID must be a number" })
    .trim()
    .regex(DECIMAL, { error: "Task ID must be a number", abort: true })
    .regex(WHOLE, "Task ID must be a whole number")
    .transform((value) => Number(value))
    .pipe(z.number().positive("Task ID must be positive"))
);
