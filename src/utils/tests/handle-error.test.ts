import { beforeEach, describe, expect, it } from "vitest";
import { createMockLogger } from "../../tasks/tests/helpers.js";
import { handleError } from "../handle-error.js";

describe("handleError", () => {
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it("should log at error level with the given params", () => {
    handleError({
      message: "Could not save tasks to /tmp/tasks.json",
      data: { path: "/tmp/tasks.json" },
      logger,
      atFunction: "taskFile.save",
    });

    expect(logger.error).toHaveBeenCalledWith({
      atFunction: "taskFile.save",
      message: "Could not save tasks to /tmp/tasks.json",
      data: { path: "/tmp/tasks.json" },
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("should return a StorageError carrying the log id", () => {
    const result = handleError({
      message: "Task file is not valid JSON",
      logger,
      atFunction: "taskFile.load",
    });

    expect(result.isErr).toBe(true);
    expect(result.error).toEqual({
      kind: "StorageError",
      message: "Task file is not valid JSON",
      logId: "error-id",
      data: undefined,
    });
  });

  it("should keep an explicit kind", () => {
    const result = handleError({
      message: "Action 'add' crashed",
      logger,
      atFunction: "tasks.add",
      kind: "InternalError",
    });

    expect(result.error.kind).toBe("InternalError");
  });
});
