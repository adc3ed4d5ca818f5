import { EventBus } from "../../event_bus";
import type { ChangeDetectedEvent } from "../../event_bus";
import { MemoryChangeAggregator } from "./memory_change_aggregator";

describe("MemoryChangeAggregator", () => {
  it("should publish injected changes only while running", async () => {
    const eventBus = new EventBus();
    const received: ChangeDetectedEvent[] = [];
    eventBus.subscribe("watch.change.detected", (e) => {
      received.push(e);
    });
    const aggregator = new MemoryChangeAggregator({ eventBus });

    expect(aggregator.emitChange("/project", "/project/a.ts")).toBe(false);

    await aggregator.start(["/project"]);
    expect(aggregator.emitChange("/project", "/project/a.ts", "moved")).toBe(true);

    await aggregator.stop();
    expect(aggregator.emitChange("/project", "/project/b.ts")).toBe(false);

    expect(received).toHaveLength(1);
    expect(received[0]?.payload).toEqual({
      root: "/project",
      path: "/project/a.ts",
      kind: "moved",
    });
    expect(aggregator.startCount).toBe(1);
    expect(aggregator.stopCount).toBe(1);
  });
});
