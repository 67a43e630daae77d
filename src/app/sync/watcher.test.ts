/**
 * Watcher tests (real temp directory, stub provider)
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { SyncReport } from "../../domain/entities";
import { createSilentLogger } from "../../infrastructure/logger";
import { StubSummarizationProvider } from "../../tests/fakes";
import { watchDirectory, type FileWatcher, type WatchOptions } from "./watcher";

describe("watchDirectory", () => {
  let projectDir: string;
  let provider: StubSummarizationProvider;
  let watcher: FileWatcher | undefined;
  let started: string[][];
  let completed: SyncReport[];

  beforeEach(async () => {
    projectDir = await fs.mkdtemp(path.join(os.tmpdir(), "docsync-watch-"));
    provider = new StubSummarizationProvider();
    started = [];
    completed = [];
  });

  afterEach(async () => {
    await watcher?.stop();
    watcher = undefined;
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  async function start(options: WatchOptions = {}): Promise<FileWatcher> {
    watcher = await watchDirectory(projectDir, {
      logger: createSilentLogger(),
      services: { provider },
      onSyncStart: (files) => started.push(files),
      onSyncComplete: (report) => completed.push(report),
      ...options,
    });
    return watcher;
  }

  test("should batch changes that arrive within the debounce window", async () => {
    await start({ debounceMs: 300 });

    await Promise.all([
      fs.writeFile(path.join(projectDir, "a.py"), "def foo():\n    return 1\n"),
      fs.writeFile(path.join(projectDir, "b.py"), "def bar():\n    return 2\n"),
      fs.writeFile(path.join(projectDir, "notes.txt"), "not source\n"),
    ]);

    await vi.waitFor(() => expect(completed).toHaveLength(1), { timeout: 5000 });
    // Writing docs.md and the cache must not trigger another run
    await new Promise((resolve) => setTimeout(resolve, 500));

    expect(started).toEqual([["a.py", "b.py"]]);
    expect(completed).toHaveLength(1);
    expect(completed[0].processedFiles).toEqual(["a.py", "b.py"]);
    expect(await fs.readFile(path.join(projectDir, "docs.md"), "utf-8")).toContain(
      "Summary of module a"
    );
  });

  test("should run one synchronization at a time", async () => {
    let active = 0;
    let maxActive = 0;
    let lateWrite: Promise<void> | undefined;
    // The first run stalls on the project summary long enough for a new change to land
    provider.delayMs = (context) => (context.scope === "project" && started.length === 1 ? 1000 : 0);

    await start({
      debounceMs: 50,
      onSyncStart: (files) => {
        started.push(files);
        active++;
        maxActive = Math.max(maxActive, active);
        if (started.length === 1) {
          lateWrite = fs.writeFile(path.join(projectDir, "c.py"), "def baz():\n    return 3\n");
        }
      },
      onSyncComplete: (report) => {
        active--;
        completed.push(report);
      },
    });

    await fs.writeFile(path.join(projectDir, "a.py"), "def foo():\n    return 1\n");

    await vi.waitFor(() => expect(completed).toHaveLength(2), { timeout: 8000 });
    await lateWrite;

    expect(maxActive).toBe(1);
    expect(started).toEqual([["a.py"], ["c.py"]]);
    expect(completed[1].processedFiles).toEqual(["a.py", "c.py"]);
  });

  test("should stop watching", async () => {
    const running = await start({ debounceMs: 50 });

    await running.stop();
    await fs.writeFile(path.join(projectDir, "a.py"), "x = 1\n");
    await new Promise((resolve) => setTimeout(resolve, 400));

    expect(running.isRunning()).toBe(false);
    expect(started).toEqual([]);
  });
});
