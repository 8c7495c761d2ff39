// backend/src/middleware/__tests__/requestContext.test.ts

import { beforeEach, describe, expect, it, vi } from "vitest";
import { makeReq, makeRes } from "../../__tests__/http";
import { requestContext } from "../requestContext";

function healthReq(headers: Record<string, string> = {}) {
  return makeReq({ method: "GET", path: "/health", route: { path: "/health" }, headers });
}

describe("requestContext", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it("uses incoming x-request-id when valid", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { res, fake } = makeRes();
    const next = vi.fn();

    requestContext(healthReq({ "x-request-id": "abc_123" }), res, next);

    expect(fake.locals.requestId).toBe("abc_123");
    expect(fake.headers["x-request-id"]).toBe("abc_123");
    expect(next).toHaveBeenCalled();
  });

  it("generates a request id when the incoming one is unusable", () => {
    const { res, fake } = makeRes();

    requestContext(healthReq({ "x-request-id": "not valid!" }), res, vi.fn());

    expect(fake.locals.requestId).not.toBe("not valid!");
    expect(fake.locals.requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("logs one line per finished request", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { res, fake } = makeRes();

    requestContext(healthReq({ "x-request-id": "abc_123" }), res, vi.fn());
    fake.statusCode = 204;
    fake.emit("finish");

    expect(logSpy).toHaveBeenCalledTimes(1);
    const logged: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(logged).toMatchObject({
      level: "info",
      msg: "request",
      requestId: "abc_123",
      method: "GET",
      path: "/health",
      status: 204,
    });
  });
});
