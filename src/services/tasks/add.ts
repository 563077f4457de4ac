import { Err, Ok, type Result } from "slang-ts";
import { z } from "zod";
import { createAction } from "../../engine/create-action.js";
import type { TaskError } from "../../tasks/types.js";
import type { TaskOutcome } from "./types.js";

const addTaskSchema = z.object({
  description: z.string({ error: "Task description is required" }),
});

export const addTaskAction = createAction({
  name: "add",
  description: "Add a new task",
  validation: addTaskSchema,
  handler: (data, { store }): Result<TaskOutcome, TaskError> => {
    const added = store.add(data.description);
    if (added.isErr) {
      return Err(added.error);
    }
    return Ok({ kind: "added", id: added.value });
  },
});
