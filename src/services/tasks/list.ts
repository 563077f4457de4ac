import { Err, Ok, type Result } from "slang-ts";
import { z } from "zod";
import { createAction } from "../../engine/create-action.js";
import type { TaskError } from "../../tasks/types.js";
import type { TaskOutcome } from "./types.js";

const listTasksSchema = z.object({
  status: z.string().optional(),
});

export const listTasksAction = createAction({
  name: "list",
  description: "List tasks, optionally only those with one status",
  validation: listTasksSchema,
  handler: (data, { store }): Result<TaskOutcome, TaskError> => {
    const listed = store.list(data.status);
    if (listed.isErr) {
      return Err(listed.error);
    }
    const tasks = listed.value;

    let storeEmpty = tasks.length === 0;
    if (storeEmpty && data.status !== undefined) {
      const all = store.list();
      if (all.isErr) {
        return Err(all.error);
      }
      storeEmpty = all.value.length === 0;
    }

    return Ok({
      kind: "listed",
      tasks,
      filter: data.status ?? null,
      storeEmpty,
    });
  },
});
