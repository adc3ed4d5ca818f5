import { mkdtemp, mkdir, writeFile, rm, unlink } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { realpathSync } from "fs";
import { EventBus } from "../../event_bus";
import type { ChangeDetectedEvent } from "../../event_bus";
import { FsChangeAggregator } from "./fs_change_aggregator";
import { MonitoredRootNotFoundError } from "../change_aggregator.errors";
import type { FSWatcher } from "chokidar";

// Real chokidar, with every created watcher kept so tests can drive its feed
const mockWatchers: FSWatcher[] = [];
jest.mock("chokidar", () => {
  const actual = jest.requireActual<typeof import("chokidar")>("chokidar");
  return {
    ...actual,
    watch: (...args: Parameters<typeof actual.watch>) => {
      const watcher = actual.watch(...args);
      mockWatchers.push(watcher);
      return watcher;
    },
  };
});

const SETTLE_MS = 150;
const WAIT_MS = 800;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("FsChangeAggregator", () => {
  let tmpDir: string;
  let eventBus: EventBus;
  let aggregator: FsChangeAggregator;
  let events: ChangeDetectedEvent[];

  beforeEach(async () => {
    tmpDir = realpathSync(await mkdtemp(join(tmpdir(), "change-aggregator-test-")));
    eventBus = new EventBus();
    events = [];
    mockWatchers.length = 0;
    eventBus.subscribe("watch.change.detected", (e) => {
      events.push(e);
    });
    aggregator = new FsChangeAggregator({ eventBus });
  });

  afterEach(async () => {
    await aggregator.stop();
    eventBus.clearSubscriptions();
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe("lifecycle", () => {
    it("should watch every root it is given", async () => {
      const src = join(tmpDir, "src");
      const lib = join(tmpDir, "lib");
      await mkdir(src);
      await mkdir(lib);

      await aggregator.start([src, lib]);

      expect(aggregator.isRunning()).toBe(true);
      expect(aggregator.getStatus().monitoredRoots).toEqual([src, lib]);
    });

    it("should throw MonitoredRootNotFoundError for a missing root", async () => {
      await expect(
        aggregator.start([join(tmpDir, "missing")])
      ).rejects.toThrow(MonitoredRootNotFoundError);
      expect(aggregator.isRunning()).toBe(false);
    });

    it("should stop publishing after stop()", async () => {
      await aggregator.start([tmpDir]);
      await aggregator.stop();

      expect(aggregator.isRunning()).toBe(false);
      expect(aggregator.getStatus().monitoredRoots).toHaveLength(0);

      await writeFile(join(tmpDir, "after-stop.txt"), "late");
      await wait(WAIT_MS);

      expect(events).toHaveLength(0);
    });
  });

  describe("normalization", () => {
    it("should publish a created change for a new file in a nested directory", async () => {
      const nested = join(tmpDir, "a", "b");
      await mkdir(nested, { recursive: true });
      await aggregator.start([tmpDir]);
      await wait(SETTLE_MS);

      const filePath = join(nested, "new.txt");
      await writeFile(filePath, "hello");
      await wait(WAIT_MS);

      const created = events.find(
        (e) => e.payload.path === filePath && e.payload.kind === "created"
      );
      expect(created).toBeDefined();
      expect(created?.payload.root).toBe(tmpDir);
      expect(created?.source).toBe("change_aggregator");
    });

    it("should publish a deleted change when a file is removed", async () => {
      const filePath = join(tmpDir, "doomed.txt");
      await writeFile(filePath, "bye");
      await aggregator.start([tmpDir]);
      await wait(SETTLE_MS);

      await unlink(filePath);
      await wait(WAIT_MS);

      expect(
        events.some((e) => e.payload.path === filePath && e.payload.kind === "deleted")
      ).toBe(true);
    });

    it("should tag each change with the root that saw it", async () => {
      const src = join(tmpDir, "src");
      const docs = join(tmpDir, "docs");
      await mkdir(src);
      await mkdir(docs);
      await aggregator.start([src, docs]);
      await wait(SETTLE_MS);

      await writeFile(join(docs, "readme.md"), "# docs");
      await wait(WAIT_MS);

      const roots = new Set(events.map((e) => e.payload.root));
      expect(roots).toEqual(new Set([docs]));
      expect(aggregator.getStatus().eventsPublished).toBe(events.length);
    });
  });

  describe("watch feed errors", () => {
    it("should record a watcher error and keep publishing changes", async () => {
      await aggregator.start([tmpDir]);
      await wait(SETTLE_MS);
      expect(mockWatchers).toHaveLength(1);

      mockWatchers[0]?.emit("error", new Error("EMFILE: too many open files"));

      expect(aggregator.getStatus().lastError?.message).toBe("EMFILE: too many open files");
      expect(aggregator.isRunning()).toBe(true);

      const filePath = join(tmpDir, "after-error.txt");
      await writeFile(filePath, "still watched");
      await wait(WAIT_MS);

      expect(events.some((e) => e.payload.path === filePath)).toBe(true);
    });
  });
});
