import { Err, Ok, type Result } from "slang-ts";
import type { TaskError } from "../tasks/types.js";
import { createDiagnosticsLog } from "../utils/index.js";
import type { Action, ActionContext, Engine, EngineOptions } from "./types.js";

const notFound = (message: string): TaskError => ({
  kind: "NotFoundError",
  message,
});

export function createEngine<T>(options: EngineOptions<T>): Engine<T> {
  const { services } = options;

  const log = createDiagnosticsLog("Engine", {
    diagnostics: options.diagnostics,
    logger: options.logger,
  });

  // O(1) Pre-computed Lookups
  const actionStore = new Map<string, Map<string, Action<T>>>();

  const initStartTime = performance.now();

  for (const service of services) {
    const serviceActions = new Map<string, Action<T>>();
    for (const action of service.actions) {
      serviceActions.set(action.name, action);
    }
    actionStore.set(service.name, serviceActions);
  }

  log(
    `Initialized in ${(performance.now() - initStartTime).toFixed(2)}ms. Loaded ${services.length} services.`
  );

  // --- Lookup API ---

  const getAction = (
    serviceName: string,
    actionName: string
  ): Result<Action<T>, TaskError> => {
    const serviceMap = actionStore.get(serviceName);
    if (!serviceMap) {
      return Err(notFound(`Service '${serviceName}' not found`));
    }

    const action = serviceMap.get(actionName);
    return action
      ? Ok(action)
      : Err(
          notFound(
            `Action '${actionName}' not found in service '${serviceName}'`
          )
        );
  };

  // --- Execution API ---

  /**
   * Executes an action:
   * 1. Resolve service.action
   * 2. Zod validation of the raw payload
   * 3. Main handler
   * 4. Log the outcome (info on success, warn on failure)
   */
  const executeAction = (
    serviceName: string,
    actionName: string,
    payload: unknown,
    context: ActionContext
  ): Result<T, TaskError> => {
    const atFunction = `${serviceName}.${actionName}`;

    const actionResult = getAction(serviceName, actionName);
    if (actionResult.isErr) {
      log(actionResult.error.message);
      return Err(actionResult.error);
    }

    log(`Executing ${atFunction}`, payload);
    const result = actionResult.value.execute(payload, context);

    if (result.isErr) {
      log(`${atFunction} failed`, result.error);
      // Errors carrying a log id were already written at error level
      if (!result.error.logId) {
        context.logger.warn({
          atFunction,
          message: result.error.message,
          data: { kind: result.error.kind, payload },
        });
      }
      return Err(result.error);
    }

    context.logger.info({
      atFunction,
      message: `${atFunction} succeeded`,
      data: { payload },
    });
    return Ok(result.value);
  };

  return {
    getAction,
    executeAction,
  };
}
