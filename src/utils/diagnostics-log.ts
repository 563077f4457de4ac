import type { TrackerLogger } from "../logging/index.js";

interface CreateDiagnosticsLogParams {
  diagnostics?: boolean;
  logger?: TrackerLogger;
}

/**
 * Creates a diagnostics log function for tracker internals.
 * Writes through the structured logger when one is given, falls back to
 * console.log, and is a no-op unless diagnostics are on.
 *
 * @param prefix - Component identifier e.g. "Engine", "TaskStore", "CLI"
 * @returns A log function: (message, data?) => void
 */
export function createDiagnosticsLog(
  prefix: string,
  params: CreateDiagnosticsLogParams
): (message: string, data?: unknown) => void {
  if (!params.diagnostics) {
    // biome-ignore lint/suspicious/noEmptyBlockStatements: intentional no-op when diagnostics disabled
    return () => {};
  }

  const { logger } = params;

  return (message: string, data?: unknown) => {
    if (!logger) {
      console.log(`[${prefix}] ${message}`, data ?? "");
      return;
    }

    logger.info({
      atFunction: prefix,
      message: `[${prefix}] ${message}`,
      data,
    });
  };
}
