import { describe, expect, it } from "vitest";
import { createTestApp, jsonResponse, loginAs } from "../../test/app.js";

describe("GET /api/dashboard/embed-config", () => {
  it("returns 401 without a session and makes no upstream calls", async () => {
    const { app, fetchFn } = createTestApp();

    const res = await app.request("/api/dashboard/embed-config");

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "Authentication required" });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("mints a token for the logged-in user and returns the embed config", async () => {
    const { app, fetchFn } = createTestApp();
    fetchFn
      .mockResolvedValueOnce(jsonResponse({ access_token: "T1" }))
      .mockResolvedValueOnce(jsonResponse({ authorization_details: [{ type: "workspace_permission" }], extra: "x" }))
      .mockResolvedValueOnce(jsonResponse({ access_token: "T3", expires_in: 600 }));
    const cookie = await loginAs(app, "alice");

    const res = await app.request("/api/dashboard/embed-config", { headers: { Cookie: cookie } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      workspace_url: "https://workspace.example.com",
      workspace_id: "ws-1",
      dashboard_id: "dash-1",
      warehouse_id: "wh-1",
      embed_token: "T3",
      token_expires_in: 600,
      user_context: {
        id: "user_alice",
        name: "Alice Johnson",
        email: "alice@example.com",
        department: "Sales",
      },
    });
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(fetchFn.mock.calls[1]?.[0]).toContain("external_viewer_id=alice%40example.com&external_value=Sales");
  });

  it("forwards the bound user's department as the filtering value", async () => {
    const { app, fetchFn } = createTestApp();
    fetchFn
      .mockResolvedValueOnce(jsonResponse({ access_token: "T1" }))
      .mockResolvedValueOnce(jsonResponse({ authorization_details: [] }))
      .mockResolvedValueOnce(jsonResponse({ access_token: "T3" }));
    const cookie = await loginAs(app, "bob");

    const res = await app.request("/api/dashboard/embed-config", { headers: { Cookie: cookie } });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ embed_token: "T3", token_expires_in: 3600 });
    expect(fetchFn.mock.calls[1]?.[0]).toContain("external_viewer_id=bob%40example.com&external_value=Engineering");
  });

  it("returns 502 with upstream detail when a step fails", async () => {
    const { app, fetchFn } = createTestApp();
    fetchFn
      .mockResolvedValueOnce(jsonResponse({ access_token: "T1" }))
      .mockResolvedValueOnce(new Response("dashboard not published", { status: 404 }));
    const cookie = await loginAs(app, "alice");

    const res = await app.request("/api/dashboard/embed-config", { headers: { Cookie: cookie } });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: "Token exchange failed",
      message: "Dashboard token info request failed (404): dashboard not published",
      step: "token_info",
      upstreamStatus: 404,
      upstreamBody: "dashboard not published",
    });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("returns 500 naming missing settings when the workspace is not configured", async () => {
    const { app, fetchFn } = createTestApp({ analytics: { workspaceUrl: "https://workspace.example.com" } });
    const cookie = await loginAs(app, "alice");

    const res = await app.request("/api/dashboard/embed-config", { headers: { Cookie: cookie } });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Embedding is not configured",
      message:
        "Missing required analytics workspace configuration: DATABRICKS_CLIENT_ID, DATABRICKS_CLIENT_SECRET, DATABRICKS_DASHBOARD_ID",
      missing: ["DATABRICKS_CLIENT_ID", "DATABRICKS_CLIENT_SECRET", "DATABRICKS_DASHBOARD_ID"],
    });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("falls through to the global handler for unexpected failures", async () => {
    const { app, fetchFn } = createTestApp();
    fetchFn.mockRejectedValueOnce(new TypeError("fetch failed"));
    const cookie = await loginAs(app, "alice");

    const res = await app.request("/api/dashboard/embed-config", { headers: { Cookie: cookie } });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    });
  });

  it("mints a fresh token on every request", async () => {
    const { app, fetchFn } = createTestApp();
    fetchFn.mockImplementation(async (url) =>
      url.includes("tokeninfo") ? jsonResponse({ authorization_details: [] }) : jsonResponse({ access_token: "T" }),
    );
    const cookie = await loginAs(app, "alice");

    await app.request("/api/dashboard/embed-config", { headers: { Cookie: cookie } });
    await app.request("/api/dashboard/embed-config", { headers: { Cookie: cookie } });

    expect(fetchFn).toHaveBeenCalledTimes(6);
  });

  it("refuses after logout", async () => {
    const { app, fetchFn } = createTestApp();
    const cookie = await loginAs(app, "alice");
    await app.request("/api/auth/logout", { method: "POST", headers: { Cookie: cookie } });

    const res = await app.request("/api/dashboard/embed-config", { headers: { Cookie: cookie } });

    expect(res.status).toBe(401);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
