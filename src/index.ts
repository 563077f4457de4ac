// Task store and file: the task collection and its JSON persistence
export {
  invalidStatusError,
  notFoundError,
  validationError,
} from "./tasks/errors.js";
export { nextTaskId } from "./tasks/next-id.js";
export { createTaskFile, taskFileSchema } from "./tasks/task-file.js";
export {
  createTaskStore,
  isTaskStatus,
  type TaskStore,
  type TaskStoreOptions,
} from "./tasks/task-store.js";
export {
  TASK_STATUSES,
  type Task,
  type TaskError,
  type TaskErrorKind,
  type TaskFile,
  type TaskSnapshot,
  type TaskStatus,
} from "./tasks/types.js";

// Engine: services, actions and their execution pipeline
export { createAction, createActions } from "./engine/create-action.js";
export { createService, createServices } from "./engine/create-service.js";
export { createEngine } from "./engine/engine.js";
export type {
  Action,
  ActionConfig,
  ActionContext,
  ActionHandler,
  Engine,
  EngineOptions,
  Service,
  Services,
} from "./engine/types.js";

// The tasks service as the CLI runs it
export { services } from "./services/services.config.js";
export type { TaskOutcome } from "./services/tasks/types.js";

// Configuration and logging
export {
  APP_NAME,
  loadConfig,
  type TrackerConfig,
} from "./config/config.js";
export {
  createLog,
  createLogger,
  resolveLogPath,
  type Log,
  type LoggerConfig,
  type TrackerLogger,
} from "./logging/index.js";

export { runCli } from "./cli/program.js";
