import { describe, it, expect, vi } from "vitest";
import { ResilientExecutor, withTimeout } from "../../../src/core/resilient-executor.js";
import { TimeoutError } from "../../../src/core/errors.js";
import { createMockLogger } from "../../helpers/mocks.js";

function codedError(code: string): Error {
  return Object.assign(new Error(`${code} failure`), { code });
}

describe("withTimeout", () => {
  it("returns the result when the call finishes in time", async () => {
    await expect(withTimeout(async () => "done", 1_000, "fetch")).resolves.toBe("done");
  });

  it("rejects with TimeoutError when the timer wins", async () => {
    const never = () => new Promise<string>(() => {});
    const run = withTimeout(never, 20, "source fetch");

    await expect(run).rejects.toThrow(TimeoutError);
    await expect(run).rejects.toThrow("source fetch timed out after 20ms");
  });
});

describe("ResilientExecutor", () => {
  it("retries transient errors up to the retry count", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(codedError("ECONNRESET"))
      .mockResolvedValueOnce("ok");

    const result = await ResilientExecutor.execute(
      fn,
      { timeout: 1_000, retries: 1, operation: "fetch" },
      createMockLogger()
    );

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry permanent errors", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("not exported"));

    await expect(
      ResilientExecutor.execute(fn, { timeout: 1_000, retries: 3, operation: "fetch" }, createMockLogger())
    ).rejects.toThrow("not exported");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after the last retry", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(codedError("EBUSY"));

    await expect(
      ResilientExecutor.execute(fn, { timeout: 1_000, retries: 2, operation: "fetch" }, createMockLogger())
    ).rejects.toThrow("EBUSY failure");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("classifies transient errors", () => {
    expect(ResilientExecutor.isTransient(codedError("ETIMEDOUT"))).toBe(true);
    expect(ResilientExecutor.isTransient(new TimeoutError("deploy", 5))).toBe(true);
    expect(ResilientExecutor.isTransient(new Error("Query timed out"))).toBe(true);
    expect(ResilientExecutor.isTransient(codedError("ENOENT"))).toBe(false);
  });
});
