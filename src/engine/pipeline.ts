import { Err, Ok, type Result } from "slang-ts";
import { prettifyError, type z } from "zod";
import { validationError } from "../tasks/errors.js";
import type { TaskError } from "../tasks/types.js";
import { handleError, safeTrySync } from "../utils/index.js";
import type { ActionConfig, ActionContext } from "./types.js";

/**
 * Validate payload against the action's Zod schema
 */
export function validatePayload<S extends z.ZodType, T>(
  action: ActionConfig<S, T>,
  payload: unknown
): Result<z.output<S>, TaskError> {
  const parseResult = action.validation.safeParse(payload);
  if (!parseResult.success) {
    const { issues } = parseResult.error;
    return Err(
      validationError(issues.map((issue) => issue.message).join("; "), {
        action: action.name,
        details: prettifyError(parseResult.error),
      })
    );
  }

  return Ok(parseResult.data);
}

/**
 * Execute the main action handler, wrapped in safeTrySync for crash safety.
 * A crash is logged at error level and surfaces as an InternalError.
 */
export function runHandler<S extends z.ZodType, T>(
  action: ActionConfig<S, T>,
  payload: z.output<S>,
  context: ActionContext
): Result<T, TaskError> {
  const result = safeTrySync(() => action.handler(payload, context));

  if (result.isErr) {
    return handleError({
      message: `Action '${action.name}' crashed: ${String(result.error)}`,
      data: { action: action.name },
      logger: context.logger,
      atFunction: action.name,
      kind: "InternalError",
    });
  }

  return result.value;
}
