import { DebounceTimer } from "./debounce_timer";

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("DebounceTimer", () => {
  let timer: DebounceTimer;

  beforeEach(() => {
    timer = new DebounceTimer();
  });

  afterEach(() => {
    timer.cancel();
  });

  describe("arm", () => {
    it("should invoke the callback once after the delay", async () => {
      const callback = jest.fn();

      timer.arm(30, callback);
      expect(timer.isPending()).toBe(true);
      expect(callback).not.toHaveBeenCalled();

      await wait(100);

      expect(callback).toHaveBeenCalledTimes(1);
      expect(timer.isPending()).toBe(false);
    });

    it("should only fire the last callback when re-armed before expiry", async () => {
      const calls: string[] = [];

      timer.arm(40, () => { calls.push("first"); });
      await wait(10);
      timer.arm(40, () => { calls.push("second"); });
      await wait(10);
      timer.arm(40, () => { calls.push("third"); });

      await wait(150);

      expect(calls).toEqual(["third"]);
    });

    it("should restart the countdown on every arm", async () => {
      const callback = jest.fn();

      for (let i = 0; i < 5; i++) {
        timer.arm(50, callback);
        await wait(20);
      }
      // 100ms since the first arm, 20ms since the last
      expect(callback).not.toHaveBeenCalled();

      await wait(120);
      expect(callback).toHaveBeenCalledTimes(1);
    });

    it("should keep running after a failing callback", async () => {
      const after = jest.fn();

      timer.arm(10, () => {
        throw new Error("boom");
      });
      await wait(50);

      timer.arm(10, after);
      await wait(50);

      expect(after).toHaveBeenCalledTimes(1);
    });
  });

  describe("cancel", () => {
    it("should prevent a pending callback", async () => {
      const callback = jest.fn();

      timer.arm(30, callback);
      expect(timer.cancel()).toBe(true);

      await wait(100);
      expect(callback).not.toHaveBeenCalled();
      expect(timer.isPending()).toBe(false);
    });

    it("should return false when nothing is pending", () => {
      expect(timer.cancel()).toBe(false);
    });

    it("should accept cancel after the timer fired without a second invocation", async () => {
      const callback = jest.fn();

      timer.arm(10, callback);
      await wait(60);

      expect(() => timer.cancel()).not.toThrow();
      expect(timer.cancel()).toBe(false);

      await wait(30);
      expect(callback).toHaveBeenCalledTimes(1);
    });
  });
});
