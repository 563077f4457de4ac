import { Err, Ok, type Result } from "slang-ts";

/**
 * Synchronous try-catch wrapper for simple operations.
 * Unlike slang-ts safeTry (always async), this is for sync-only code paths.
 */
export function safeTrySync<T>(fn: () => T): Result<T, unknown> {
  try {
    return Ok(fn());
  } catch (error) {
    return Err(error);
  }
}
