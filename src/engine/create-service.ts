import type { Service } from "./types.js";

/**
 * Typed identity for defining a service with full type inference.
 * Returns the config object as-is.
 */
export function createService<T>(config: Service<T>): Service<T> {
  return config;
}

/**
 * Typed identity for defining multiple services with full type inference.
 * Returns the config array as-is.
 */
export function createServices<T>(configs: Service<T>[]): Service<T>[] {
  return configs;
}
