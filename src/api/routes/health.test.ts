import { describe, expect, it } from "vitest";
import { createTestApp } from "../../test/app.js";
import { createHealthRoutes } from "./health.js";

describe("health routes", () => {
  it("GET /api/health returns healthy with a timestamp", async () => {
    const { app } = createTestApp({ clock: () => new Date("2026-10-18T08:30:00.000Z") });
    const res = await app.request("/api/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "healthy", timestamp: "2026-10-18T08:30:00.000Z" });
  });

  it("does not require a session", async () => {
    const routes = createHealthRoutes();
    const res = await routes.request("/");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "healthy",
      timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
    });
  });
});
