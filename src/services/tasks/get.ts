import { Err, Ok, type Result } from "slang-ts";
import { z } from "zod";
import { createAction } from "../../engine/create-action.js";
import type { TaskError } from "../../tasks/types.js";
import { type TaskOutcome, taskIdSchema } from "./types.js";

const getTaskSchema = z.object({
  id: taskIdSchema,
});

export const getTaskAction = createAction({
  name: "get",
  description: "Get a task by ID",
  validation: getTaskSchema,
  handler: (data, { store }): Result<TaskOutcome, TaskError> => {
    const found = store.get(data.id);
    if (found.isErr) {
      return Err(found.error);
    }
    return Ok({ kind: "found", task: found.value });
  },
});
