import { TransientError } from "../src/errors.js";
import { withTimeout } from "../src/run/timeout.js";

describe("withTimeout", () => {
  it("returns the result when work finishes first", async () => {
    const controller = new AbortController();
    await expect(withTimeout(Promise.resolve(42), 1000, controller, "work")).resolves.toBe(42);
    expect(controller.signal.aborted).toBe(false);
  });

  it("aborts and rejects with TransientError at the deadline", async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => {});
    const err = await withTimeout(never, 10, controller, "evaluation").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransientError);
    expect(err instanceof Error ? err.message : "").toBe("evaluation timed out after 10ms");
    expect(controller.signal.aborted).toBe(true);
  });
});
