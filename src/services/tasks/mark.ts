import { Err, Ok, type Result } from "slang-ts";
import { z } from "zod";
import { createAction } from "../../engine/create-action.js";
import type { TaskError } from "../../tasks/types.js";
import { type TaskOutcome, taskIdSchema } from "./types.js";

// The status token is checked by the store, which reports InvalidStatusError
const markTaskSchema = z.object({
  id: taskIdSchema,
  status: z.string({ error: "Task status is required" }),
});

export const markTaskAction = createAction({
  name: "mark",
  description: "Set the status of a task",
  validation: markTaskSchema,
  handler: (data, { store }): Result<TaskOutcome, TaskError> => {
    const marked = store.mark(data.id, data.status);
    if (marked.isErr) {
      return Err(marked.error);
    }
    return Ok({ kind: "marked", task: marked.value });
  },
});
