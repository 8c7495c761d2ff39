// backend/src/middleware/__tests__/rateLimit.test.ts

import { describe, expect, it, vi } from "vitest";
import { makeReq, makeRes } from "../../__tests__/http";
import { createRateLimitMiddleware } from "../rateLimit";

describe("rate limit", () => {
  it("rejects the request past the limit until the window resets", () => {
    let at = 10_000;
    const limit = createRateLimitMiddleware({ windowMs: 1000, max: 2 }, () => at);
    const next = vi.fn();

    limit(makeReq({ ip: "10.0.0.1" }), makeRes().res, next);
    limit(makeReq({ ip: "10.0.0.1" }), makeRes().res, next);
    const blocked = makeRes();
    limit(makeReq({ ip: "10.0.0.1" }), blocked.res, next);

    expect(next).toHaveBeenCalledTimes(2);
    expect(blocked.fake.statusCode).toBe(429);
    expect(blocked.fake.body).toEqual({
      error: "Too many requests. Please slow down and try again.",
      code: "RATE_LIMITED",
    });
    expect(blocked.fake.headers["x-rate-limit-remaining"]).toBe("0");
    expect(blocked.fake.headers["x-rate-limit-reset"]).toBe("1");

    at += 1000;
    limit(makeReq({ ip: "10.0.0.1" }), makeRes().res, next);
    expect(next).toHaveBeenCalledTimes(3);
  });

  it("counts each client separately", () => {
    const limit = createRateLimitMiddleware({ windowMs: 1000, max: 1 }, () => 0);
    const next = vi.fn();

    limit(makeReq({ ip: "10.0.0.1" }), makeRes().res, next);
    limit(makeReq({ ip: "10.0.0.2" }), makeRes().res, next);

    expect(next).toHaveBeenCalledTimes(2);
  });
});
