import type { TaskOutcome } from "../services/tasks/types.js";
import type { Task } from "../tasks/types.js";
import type { CliOutput } from "./utils/log.js";

const pad = (value: number) => String(value).padStart(2, "0");

/** Local time as YYYY-MM-DD HH:MM:SS; unparseable values pass through */
export const formatTimestamp = (iso: string): string => {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
};

export const formatTask = (task: Task): string[] => [
  `ID: ${task.id}`,
  `  Description: ${task.description}`,
  `  Status: ${task.status}`,
  `  Created At: ${formatTimestamp(task.createdAt)}`,
  `  Updated At: ${formatTimestamp(task.updatedAt)}`,
  "-".repeat(20),
];

export const listHeader = (filter: string | null): string => {
  if (filter === null || filter === "all") {
    return "All Tasks";
  }
  return `${filter.charAt(0).toUpperCase()}${filter.slice(1)} Tasks`;
};

const printTasks = (output: CliOutput, tasks: Task[]) => {
  for (const task of tasks) {
    for (const line of formatTask(task)) {
      output.line(line);
    }
  }
};

/** Prints the outcome of a tasks action */
export const printOutcome = (output: CliOutput, outcome: TaskOutcome) => {
  switch (outcome.kind) {
    case "added":
      output.success(`Task added successfully (ID: ${outcome.id})`);
      return;
    case "updated":
      output.success(`Task ${outcome.task.id} updated successfully.`);
      return;
    case "deleted":
      output.success(`Task ${outcome.task.id} deleted successfully.`);
      return;
    case "marked":
      output.success(
        `Task ${outcome.task.id} marked as '${outcome.task.status}'.`
      );
      return;
    case "found":
      printTasks(output, [outcome.task]);
      return;
    case "listed": {
      const { tasks, filter, storeEmpty } = outcome;
      if (tasks.length === 0) {
        output.info(
          storeEmpty || filter === null || filter === "all"
            ? "No tasks found."
            : `No tasks found with status '${filter}'.`
        );
        return;
      }
      output.header(`--- ${listHeader(filter)} ---`);
      printTasks(output, tasks);
      return;
    }
    default: {
      const unreachable: never = outcome;
      return unreachable;
    }
  }
};
