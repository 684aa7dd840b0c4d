/**
 * Tests for logger and request id middleware.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import { createTestApp, jsonRequest } from "../setup.js";

function captureLogger(): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(msg: string) {
        const parsed: unknown = JSON.parse(msg);
        if (typeof parsed === "object" && parsed !== null) {
          lines.push(parsed as Record<string, unknown>);
        }
      },
    },
  );
  return { logger, lines };
}

function requestLines(lines: Record<string, unknown>[]): Record<string, unknown>[] {
  return lines.filter((line) => "requestId" in line);
}

describe("loggerMiddleware", () => {
  it("logs one line per request with its details", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp({ logger });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    const entries = requestLines(lines);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 30,
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-1",
      msg: "GET /health 200",
    });
  });

  it("logs client errors at warn", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp({ logger });

    await app.request(jsonRequest("/api/v1/groups", "POST", { operations: [] }));

    const entries = requestLines(lines);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.["level"]).toBe(40);
    expect(entries[0]?.["status"]).toBe(400);
  });

  it("shares the logger with the service", async () => {
    const { logger, lines } = captureLogger();
    createTestApp({ logger });

    expect(lines.map((line) => line["msg"])).toEqual([
      "Settlement engine deployed",
      "Account funded",
      "Account funded",
    ]);
  });
});

describe("requestIdMiddleware", () => {
  it("echoes an incoming request id", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", { headers: { "X-Request-Id": "trace-42" } });

    expect(res.headers.get("X-Request-Id")).toBe("trace-42");
  });

  it("generates an id when none is sent", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });
});
