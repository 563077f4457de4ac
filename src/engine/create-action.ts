import { Err } from "slang-ts";
import type { z } from "zod";
import { runHandler, validatePayload } from "./pipeline.js";
import type { Action, ActionConfig } from "./types.js";

/**
 * Defines an action from a schema and a handler typed by that schema.
 * The returned action validates its raw payload before the handler sees it.
 */
export function createAction<S extends z.ZodType, T>(
  config: ActionConfig<S, T>
): Action<T> {
  return {
    name: config.name,
    description: config.description,
    execute: (payload, context) => {
      const validated = validatePayload(config, payload);
      if (validated.isErr) {
        return Err(validated.error);
      }
      return runHandler(config, validated.value, context);
    },
  };
}

/**
 * Typed identity for defining multiple actions with full type inference.
 * Returns the config array as-is.
 */
export function createActions<T>(configs: Action<T>[]): Action<T>[] {
  return configs;
}
