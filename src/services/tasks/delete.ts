import { Err, Ok, type Result } from "slang-ts";
import { z } from "zod";
import { createAction } from "../../engine/create-action.js";
import type { TaskError } from "../../tasks/types.js";
import { type TaskOutcome, taskIdSchema } from "./types.js";

const deleteTaskSchema = z.object({
  id: taskIdSchema,
});

export const deleteTaskAction = createAction({
  name: "delete",
  description: "Delete a task by ID",
  validation: deleteTaskSchema,
  handler: (data, { store }): Result<TaskOutcome, TaskError> => {
    const deleted = store.delete(data.id);
    if (deleted.isErr) {
      return Err(deleted.error);
    }
    return Ok({ kind: "deleted", task: deleted.value });
  },
});
