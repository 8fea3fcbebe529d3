import { IncomingMessage, ServerResponse } from "node:http";
import { Socket } from "node:net";
import { describe, expect, it, vi } from "vitest";
import { logger } from "../../../src/core/logger.js";
import { requestId, requestLogger, resolveRequestId } from "../../../src/core/requestId.js";

function exchange(headers: Record<string, string> = {}) {
  const req = new IncomingMessage(new Socket());
  Object.assign(req.headers, headers);
  const res = new ServerResponse(req);
  return { req, res };
}

describe("resolveRequestId", () => {
  const generate = () => "generated-id";

  it("keeps a well-formed caller id", () => {
    expect(resolveRequestId("req-42.a:b_c", generate)).toBe("req-42.a:b_c");
    expect(resolveRequestId(["first", "second"], generate)).toBe("first");
  });

  it("generates an id when none or a malformed one is sent", () => {
    expect(resolveRequestId(undefined, generate)).toBe("generated-id");
    expect(resolveRequestId("", generate)).toBe("generated-id");
    expect(resolveRequestId("has space", generate)).toBe("generated-id");
    expect(resolveRequestId("x".repeat(129), generate)).toBe("generated-id");
  });
});

describe("requestId middleware", () => {
  it("echoes the caller's id and binds it to the request logger", () => {
    const { req, res } = exchange({ "x-request-id": "abc-123" });
    const next = vi.fn();

    requestId(req, res, next);

    expect(res.getHeader("X-Request-ID")).toBe("abc-123");
    expect(next).toHaveBeenCalledTimes(1);
    expect(requestLogger(req).bindings()).toMatchObject({ requestId: "abc-123" });
  });

  it("assigns a UUID when the caller sends none", () => {
    const { req, res } = exchange();
    requestId(req, res, vi.fn());
    expect(String(res.getHeader("X-Request-ID"))).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it("falls back to the root logger outside a request", () => {
    const { req } = exchange();
    expect(requestLogger(req)).toBe(logger);
  });
});
