// ---------------------------------------------------------------------------
// Integration tests for the /health route.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { healthRoutes } from "../../../src/api/routes/health.js";

interface HealthBody {
  status: string;
  uptime: number;
  timestamp: string;
}

describe("GET /health", () => {
  it("returns 200 with status ok, uptime, and timestamp", async () => {
    const app = healthRoutes();

    const res = await app.request("/");

    expect(res.status).toBe(200);

    const body = (await res.json()) as HealthBody;
    expect(body).toHaveProperty("status", "ok");
    expect(typeof body.uptime).toBe("number");
    expect(body.uptime).toBeGreaterThanOrEqual(0);
    // Verify timestamp is a valid ISO 8601 string
    expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
  });

  it("returns application/json content type", async () => {
    const res = await healthRoutes().request("/");

    expect(res.headers.get("content-type")).toContain("application/json");
  });
});
