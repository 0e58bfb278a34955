import { describe, expect, it } from "vitest";
import { createTestApp } from "../test/app.js";

describe("Security headers", () => {
  const { app } = createTestApp();

  it("sets Content-Security-Policy on API responses", async () => {
    const res = await app.request("/api/health");
    const csp = res.headers.get("Content-Security-Policy");
    expect(csp).toContain("default-src 'none'");
    expect(csp).toContain("frame-ancestors 'none'");
  });

  it("sets Strict-Transport-Security with preload", async () => {
    const res = await app.request("/api/health");
    expect(res.headers.get("Strict-Transport-Security")).toBe("max-age=31536000; includeSubDomains; preload");
  });

  it("sets X-Frame-Options to DENY", async () => {
    const res = await app.request("/api/health");
    expect(res.headers.get("X-Frame-Options")).toBe("DENY");
  });

  it("sets X-Content-Type-Options to nosniff", async () => {
    const res = await app.request("/api/health");
    expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
  });

  it("sets Referrer-Policy to no-referrer", async () => {
    const res = await app.request("/api/health");
    expect(res.headers.get("Referrer-Policy")).toBe("no-referrer");
  });

  it("does not expose X-Powered-By", async () => {
    const res = await app.request("/api/health");
    expect(res.headers.get("X-Powered-By")).toBeNull();
  });

  it("includes security headers on not-found responses too", async () => {
    const res = await app.request("/nonexistent-route-12345");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
    expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
    expect(res.headers.get("X-Frame-Options")).toBe("DENY");
  });
});
