import type { Task } from "./types.js";

/**
 * The id the next added task receives: past every id in use and never below
 * the stored counter, so ids freed by deletion are not handed out again.
 */
export const nextTaskId = (tasks: Task[], counter = 1): number => {
  const highest = tasks.reduce((max, task) => Math.max(max, task.id), 0);
  return Math.max(counter, highest + 1);
};
