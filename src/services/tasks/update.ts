import { Err, Ok, type Result } from "slang-ts";
import { z } from "zod";
import { createAction } from "../../engine/create-action.js";
import type { TaskError } from "../../tasks/types.js";
import { type TaskOutcome, taskIdSchema } from "./types.js";

const updateTaskSchema = z.object({
  id: taskIdSchema,
  description: z.string({ error: "Task description is required" }),
});

export const updateTaskAction = createAction({
  name: "update",
  description: "Replace the description of a task",
  validation: updateTaskSchema,
  handler: (data, { store }): Result<TaskOutcome, TaskError> => {
    const updated = store.update(data.id, data.description);
    if (updated.isErr) {
      return Err(updated.error);
    }
    return Ok({ kind: "updated", task: updated.value });
  },
});
