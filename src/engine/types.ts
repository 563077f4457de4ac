import type { Result } from "slang-ts";
import type { z } from "zod";
import type { TrackerLogger } from "../logging/index.js";
import type { TaskStore } from "../tasks/task-store.js";
import type { TaskError } from "../tasks/types.js";

/** Passed explicitly to every action; nothing is read from module state */
export interface ActionContext {
  store: TaskStore;
  logger: TrackerLogger;
}

export type ActionHandler<P, T> = (
  data: P,
  context: ActionContext
) => Result<T, TaskError>;

export type ActionConfig<S extends z.ZodType, T> = {
  name: string;
  description: string;
  validation: S;
  handler: ActionHandler<z.output<S>, T>;
};

/** An action with its payload type erased, as registered on a service */
export type Action<T = unknown> = {
  name: string;
  description: string;
  execute: (payload: unknown, context: ActionContext) => Result<T, TaskError>;
};

export type Service<T = unknown> = {
  name: string;
  description: string;
  actions: Action<T>[];
};

export type Services<T = unknown> = Service<T>[];

export type EngineOptions<T = unknown> = {
  diagnostics?: boolean;
  /** Receives diagnostics records; without one they go to the console */
  logger?: TrackerLogger;
  services: Services<T>;
};

export type Engine<T = unknown> = {
  getAction: (
    serviceName: string,
    actionName: string
  ) => Result<Action<T>, TaskError>;
  executeAction: (
    serviceName: string,
    actionName: string,
    payload: unknown,
    context: ActionContext
  ) => Result<T, TaskError>;
};
