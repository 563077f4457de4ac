import { Ok } from "slang-ts";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createAction } from "../create-action.js";
import { createService } from "../create-service.js";
import { createEngine } from "../engine.js";
import { createMockLogger } from "../../tasks/tests/helpers.js";
import type { Action, Service } from "../types.js";

const dummyAction = (name: string, description: string) =>
  createAction({
    name,
    description,
    validation: z.object({}),
    handler: () => Ok("dummy"),
  });

const mockServices: Service<string>[] = [
  createService({
    name: "reports",
    description: "Reporting service",
    actions: [
      dummyAction("daily", "Daily report"),
      dummyAction("weekly", "Weekly report"),
    ],
  }),
  {
    name: "archive",
    description: "Archive service",
    actions: [dummyAction("export", "Export everything")],
  },
];

describe("Engine Initialization", () => {
  it("should return an object with expected methods", () => {
    const engine = createEngine({ services: mockServices });
    expect(typeof engine.getAction).toBe("function");
    expect(typeof engine.executeAction).toBe("function");
  });

  it("should log diagnostics if enabled", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    createEngine({ services: mockServices, diagnostics: true });
    expect(spy).toHaveBeenCalled();
    expect(String(spy.mock.calls[0]?.[0])).toContain("[Engine] Initialized");
    spy.mockRestore();
  });

  it("should send diagnostics to the given logger", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createMockLogger();
    createEngine({ services: mockServices, diagnostics: true, logger });

    expect(spy).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info.mock.calls[0]?.[0].atFunction).toBe("Engine");
    expect(logger.info.mock.calls[0]?.[0].message).toMatch(
      /^\[Engine\] Initialized in \S+ms\. Loaded 2 services\.$/
    );
    spy.mockRestore();
  });

  it("should stay quiet when diagnostics are off", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    createEngine({ services: mockServices });
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});

describe("getAction", () => {
  const engine = createEngine({ services: mockServices });
  it("should return Ok with full action for valid service/action", () => {
    const result = engine.getAction("reports", "daily");
    expect(result.isOk).toBe(true);
    if (!result.isOk) {
      return;
    }
    const action: Action<string> = result.value;
    expect(action.name).toBe("daily");
    expect(typeof action.execute).toBe("function");
  });

  it("should return Err when action does not exist", () => {
    const result = engine.getAction("reports", "nope");
    expect(result.isErr && result.error.message).toBe(
      "Action 'nope' not found in service 'reports'"
    );
  });

  it("should return Err when service does not exist", () => {
    const result = engine.getAction("badService", "daily");
    expect(result.isErr && result.error.message).toBe(
      "Service 'badService' not found"
    );
  });
});
