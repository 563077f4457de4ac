import {
  existsSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger } from "../../logging/index.js";
import { createTaskFile } from "../task-file.js";
import type { TaskSnapshot } from "../types.js";

const logger = createLogger("test-task-file", {
  logDir: tmpdir(),
  mode: "silent",
});

const snapshot: TaskSnapshot = {
  nextId: 5,
  tasks: [
    {
      id: 2,
      description: "Write report",
      status: "in-progress",
      createdAt: "2026-04-02T08:15:00.000Z",
      updatedAt: "2026-04-03T17:45:30.250Z",
    },
    {
      id: 4,
      description: "Call the plumber",
      status: "done",
      createdAt: "2026-04-04T12:00:00.000Z",
      updatedAt: "2026-04-04T12:00:00.000Z",
    },
  ],
};

describe("createTaskFile", () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "task-file-"));
    path = join(dir, "tasks.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should load a missing file as an empty collection", () => {
    const loaded = createTaskFile({ path, logger }).load();
    expect(loaded.isOk && loaded.value).toEqual({ nextId: 1, tasks: [] });
  });

  it("should load a blank file as an empty collection", () => {
    writeFileSync(path, "  \n", "utf-8");
    const loaded = createTaskFile({ path, logger }).load();
    expect(loaded.isOk && loaded.value).toEqual({ nextId: 1, tasks: [] });
  });

  it("should preserve every field across save and load", () => {
    const file = createTaskFile({ path, logger });

    const saved = file.save(snapshot);
    expect(saved.isOk).toBe(true);

    const loaded = file.load();
    expect(loaded.isOk && loaded.value).toEqual(snapshot);
  });

  it("should write indented JSON with a trailing newline", () => {
    const file = createTaskFile({ path, logger });
    file.save({ nextId: 2, tasks: [] });

    expect(readFileSync(path, "utf-8")).toBe(
      '{\n    "nextId": 2,\n    "tasks": []\n}\n'
    );
    expect(existsSync(`${path}.tmp`)).toBe(false);
  });

  it("should create missing parent directories on save", () => {
    const nestedPath = join(dir, "nested", "deeper", "tasks.json");
    const saved = createTaskFile({ path: nestedPath, logger }).save(snapshot);

    expect(saved.isOk).toBe(true);
    expect(existsSync(nestedPath)).toBe(true);
  });

  it("should derive the counter from a bare task array", () => {
    writeFileSync(path, JSON.stringify(snapshot.tasks), "utf-8");

    const loaded = createTaskFile({ path, logger }).load();
    expect(loaded.isOk).toBe(true);
    if (!loaded.isOk) {
      return;
    }
    expect(loaded.value.nextId).toBe(5);
    expect(loaded.value.tasks).toEqual(snapshot.tasks);
  });

  it("should load offset-free timestamps with microseconds unchanged", () => {
    const legacy = [
      {
        id: 1,
        description: "Book flights",
        status: "todo",
        createdAt: "2025-01-05T10:00:00.123456",
        updatedAt: "2025-01-06T18:30:15.654321",
      },
    ];
    writeFileSync(path, JSON.stringify(legacy, null, 4), "utf-8");

    const loaded = createTaskFile({ path, logger }).load();
    expect(loaded.isOk && loaded.value).toEqual({ nextId: 2, tasks: legacy });
  });

  it("should never let the counter fall below the highest id", () => {
    writeFileSync(
      path,
      JSON.stringify({ nextId: 3, tasks: snapshot.tasks }),
      "utf-8"
    );

    const loaded = createTaskFile({ path, logger }).load();
    expect(loaded.isOk && loaded.value.nextId).toBe(5);
  });

  it("should keep a counter above the highest id", () => {
    writeFileSync(
      path,
      JSON.stringify({ nextId: 9, tasks: snapshot.tasks }),
      "utf-8"
    );

    const loaded = createTaskFile({ path, logger }).load();
    expect(loaded.isOk && loaded.value.nextId).toBe(9);
  });

  it("should reject a task with an unknown status", () => {
    writeFileSync(
      path,
      JSON.stringify([{ ...snapshot.tasks[0], status: "blocked" }]),
      "utf-8"
    );

    const loaded = createTaskFile({ path, logger }).load();
    expect(loaded.isErr).toBe(true);
    if (loaded.isErr) {
      expect(loaded.error.kind).toBe("StorageError");
      expect(loaded.error.message).toBe(
        `Task file ${path} has an invalid format`
      );
    }
  });

  it("should reject duplicate ids", () => {
    const [first] = snapshot.tasks;
    writeFileSync(path, JSON.stringify([first, first]), "utf-8");

    const loaded = createTaskFile({ path, logger }).load();
    expect(loaded.isErr && loaded.error.kind).toBe("StorageError");
  });

  it("should report a file that is not JSON", () => {
    writeFileSync(path, "tasks: []", "utf-8");

    const loaded = createTaskFile({ path, logger }).load();
    expect(loaded.isErr).toBe(true);
    if (loaded.isErr) {
      expect(loaded.error.message).toBe(`Task file ${path} is not valid JSON`);
      expect(loaded.error.logId).toHaveLength(6);
    }
  });

  it("should report a path that cannot be read", () => {
    const loaded = createTaskFile({ path: dir, logger }).load();
    expect(loaded.isErr).toBe(true);
    if (loaded.isErr) {
      expect(loaded.error.kind).toBe("StorageError");
      expect(loaded.error.message).toBe(`Could not read task file ${dir}`);
    }
  });
});
