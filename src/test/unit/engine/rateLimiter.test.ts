import { expect } from "chai";

import { CancelledError } from "../../../errors/jobErrors.js";
import { RateLimiter, sleep } from "../../../engine/llm/rateLimiter.js";
import { captureRejection } from "../../utils/fakes.js";

describe("RateLimiter", () => {
  it("spaces requests by the configured rate", async () => {
    let clock = 1000;
    const waits: number[] = [];
    const limiter = new RateLimiter(4, () => clock, async (ms) => {
      waits.push(ms);
    });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();
    expect(waits).to.deep.equal([250, 500]);

    clock = 2000;
    await limiter.acquire();
    expect(waits).to.deep.equal([250, 500]);
  });

  it("passes the caller's signal to the wait", async () => {
    const controller = new AbortController();
    const signals: Array<AbortSignal | undefined> = [];
    const limiter = new RateLimiter(1, () => 0, async (_ms, signal) => {
      signals.push(signal);
    });

    await limiter.acquire(controller.signal);
    await limiter.acquire(controller.signal);

    expect(signals).to.deep.equal([controller.signal]);
  });

  it("rejects a non-positive rate", () => {
    expect(() => new RateLimiter(0)).to.throw(RangeError, "qps must be greater than 0 (got 0)");
    expect(() => new RateLimiter(Number.NaN)).to.throw(RangeError);
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    const started = Date.now();
    await sleep(5);
    expect(Date.now() - started).to.be.at.least(4);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort("stop");

    const error = await captureRejection(sleep(10_000, controller.signal));

    expect(error).to.be.instanceOf(CancelledError);
  });

  it("rejects when the signal fires during the wait", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort("stop"), 5);

    const error = await captureRejection(sleep(10_000, controller.signal));

    expect(error).to.be.instanceOf(CancelledError);
  });
});
