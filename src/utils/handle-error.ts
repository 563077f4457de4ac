import { Err, type Err as ErrType } from "slang-ts";
import type { TrackerLogger } from "../logging/index.js";
import type { TaskError, TaskErrorKind } from "../tasks/types.js";

export interface HandleErrorParams {
  message: string;
  logger: TrackerLogger;
  data?: unknown;
  atFunction: string;
  /** Defaults to StorageError */
  kind?: TaskErrorKind;
}

/**
 * Logs a failure at error level and returns it as an Err carrying the log id.
 */
export function handleError(params: HandleErrorParams): ErrType<TaskError> {
  const logId = params.logger.error({
    atFunction: params.atFunction,
    message: params.message,
    data: params.data,
  });
  return Err({
    kind: params.kind ?? "StorageError",
    message: params.message,
    logId,
    data: params.data,
  });
}
