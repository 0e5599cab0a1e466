import { EventEmitter } from "node:events";

import { describe, expect, it, vi } from "vitest";

import {
  constantTimeEquals,
  createApiAuthMiddleware,
  createInFlightTracker,
  createSecurityHeadersMiddleware
} from "../../server/http/middleware.js";
import { createMockResponse } from "../helpers/routeHarness.js";

function isProtectedPath(requestPath: string): boolean {
  return requestPath.startsWith("/api/") || requestPath === "/trigger";
}

function authorize(token: string, request: { path: string; method?: string; headers?: Record<string, string> }) {
  const middleware = createApiAuthMiddleware(token, { isProtectedPath });
  const response = createMockResponse();
  const next = vi.fn();
  middleware(
    { path: request.path, method: request.method ?? "GET", headers: request.headers ?? {} } as never,
    response as never,
    next
  );
  return { response, next };
}

describe("api auth middleware", () => {
  it("leaves public paths open", () => {
    expect(authorize("test-token", { path: "/health" }).next).toHaveBeenCalledTimes(1);
    expect(authorize("test-token", { path: "/webhook", method: "POST" }).next).toHaveBeenCalledTimes(1);
  });

  it("rejects protected paths without the token", () => {
    const { response, next } = authorize("test-token", { path: "/trigger" });

    expect(next).not.toHaveBeenCalled();
    expect(response.statusCode).toBe(401);
    expect(response.body).toEqual({ error: "Unauthorized" });
  });

  it("accepts a bearer token or the api token header", () => {
    expect(
      authorize("test-token", { path: "/api/updates/status", headers: { authorization: "Bearer test-token" } }).next
    ).toHaveBeenCalledTimes(1);
    expect(
      authorize("test-token", { path: "/api/updates/apply", headers: { "x-api-token": "test-token" } }).next
    ).toHaveBeenCalledTimes(1);
    expect(
      authorize("test-token", { path: "/api/updates/apply", headers: { "x-api-token": "wrong-token" } }).response
        .statusCode
    ).toBe(401);
  });

  it("lets preflight requests through and stays open without a configured token", () => {
    expect(authorize("test-token", { path: "/trigger", method: "OPTIONS" }).next).toHaveBeenCalledTimes(1);
    expect(authorize("  ", { path: "/trigger" }).next).toHaveBeenCalledTimes(1);
  });
});

describe("security headers", () => {
  it("sets restrictive headers", () => {
    const response = createMockResponse();
    const next = vi.fn();

    createSecurityHeadersMiddleware()({} as never, response as never, next);

    expect(response.headers).toEqual({
      "x-content-type-options": "nosniff",
      "x-frame-options": "DENY",
      "referrer-policy": "no-referrer"
    });
    expect(next).toHaveBeenCalledTimes(1);
  });
});

describe("in-flight tracker", () => {
  it("counts requests until they finish or close", () => {
    const tracker = createInFlightTracker();
    const first = new EventEmitter();
    const second = new EventEmitter();

    tracker.middleware({} as never, first as never, () => undefined);
    tracker.middleware({} as never, second as never, () => undefined);
    expect(tracker.count()).toBe(2);

    first.emit("finish");
    first.emit("close");
    expect(tracker.count()).toBe(1);
    expect(tracker.hasInFlightWork()).toBe(true);

    second.emit("close");
    expect(tracker.hasInFlightWork()).toBe(false);
  });
});

describe("constant time comparison", () => {
  it("compares by content and length", () => {
    expect(constantTimeEquals("test-token", "test-token")).toBe(true);
    expect(constantTimeEquals("test-token", "test-tokem")).toBe(false);
    expect(constantTimeEquals("short", "longer-value")).toBe(false);
  });
});
