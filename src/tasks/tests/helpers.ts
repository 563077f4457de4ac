import { Ok } from "slang-ts";
import { vi } from "vitest";
import type { TrackerLogger } from "../../logging/index.js";
import type { TaskFile, TaskSnapshot } from "../types.js";

/** Task file kept in memory; every save is recorded as a deep copy */
export const createMemoryTaskFile = (
  initial: TaskSnapshot = { nextId: 1, tasks: [] }
) => {
  let stored = structuredClone(initial);
  const saves: TaskSnapshot[] = [];

  const file: TaskFile = {
    path: "memory://tasks.json",
    load: () => Ok(structuredClone(stored)),
    save: (snapshot) => {
      stored = structuredClone(snapshot);
      saves.push(structuredClone(snapshot));
      return Ok(true);
    },
  };

  return { file, saves, current: () => structuredClone(stored) };
};

export const createMockLogger = () => {
  const logger = {
    info: vi.fn((_input: Parameters<TrackerLogger["info"]>[0]) => "info-id"),
    warn: vi.fn((_input: Parameters<TrackerLogger["warn"]>[0]) => "warn-id"),
    error: vi.fn((_input: Parameters<TrackerLogger["error"]>[0]) => "error-id"),
  } satisfies TrackerLogger;
  return logger;
};
