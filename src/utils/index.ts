// biome-ignore lint/performance/noBarrelFile: Public API entry point for utilities
export { createDiagnosticsLog } from "./diagnostics-log.js";
export { type HandleErrorParams, handleError } from "./handle-error.js";
export { safeTrySync } from "./safe-try-sync.js";
