/**
 * Embed token minter: per-user scoped tokens for a published dashboard.
 *
 * Three sequential calls against the analytics workspace:
 *   1. client-credentials grant for a broad `all-apis` token
 *   2. dashboard token-info lookup carrying the viewer's identity and
 *      row-level-security value
 *   3. client-credentials grant narrowed by the returned authorization details
 *
 * There is no caching, retry or reuse: every call to `mint` runs the full
 * exchange, and any failure discards whatever earlier steps obtained.
 */

import { z } from "zod";
import { logger } from "../config/logger.js";
import type { DirectoryUser } from "../users/user-directory.js";
import { EmbedConfigurationError, type MintStep, UpstreamTokenError } from "./errors.js";

/**
 * A function that performs an HTTP fetch. Accepts the same signature as
 * the global `fetch`. This indirection lets tests inject a stub without
 * mocking globals.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/** Workspace settings consumed by the minter. All four are required to mint. */
export interface EmbedTokenMinterConfig {
  workspaceUrl?: string;
  clientId?: string;
  clientSecret?: string;
  dashboardId?: string;
}

/** The identity attributes forwarded to the workspace. */
export type EmbedViewer = Pick<DirectoryUser, "id" | "email" | "department">;

export interface TokenResult {
  access_token: string;
  token_type: "Bearer";
  /** Lifetime in seconds. */
  expires_in: number;
  /** Epoch seconds at which the token was minted. */
  created_at: number;
}

export interface EmbedTokenMinter {
  mint(viewer: EmbedViewer): Promise<TokenResult>;
}

export const DEFAULT_TOKEN_EXPIRES_IN = 3600;

const REQUIRED_SETTINGS = [
  ["workspaceUrl", "DATABRICKS_WORKSPACE_URL"],
  ["clientId", "DATABRICKS_CLIENT_ID"],
  ["clientSecret", "DATABRICKS_CLIENT_SECRET"],
  ["dashboardId", "DATABRICKS_DASHBOARD_ID"],
] as const;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

/** Lifetime in whole seconds. Numeric strings are accepted; absent or null falls back to the default. */
const expiresInSchema = z
  .preprocess(
    (value) => (typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value) : value),
    z.number().int().nonnegative(),
  )
  .nullish();

const scopedTokenResponseSchema = tokenResponseSchema.extend({
  expires_in: expiresInSchema,
});

const tokenInfoSchema = z.record(z.string(), z.unknown());

type ScopedTokenResponse = z.infer<typeof scopedTokenResponseSchema>;

interface ResolvedSettings {
  workspaceUrl: string;
  clientId: string;
  clientSecret: string;
  dashboardId: string;
}

function resolveSettings(config: EmbedTokenMinterConfig): ResolvedSettings {
  const missing = REQUIRED_SETTINGS.filter(([key]) => !config[key]).map(([, envVar]) => envVar);
  const { workspaceUrl, clientId, clientSecret, dashboardId } = config;
  if (missing.length > 0 || !workspaceUrl || !clientId || !clientSecret || !dashboardId) {
    throw new EmbedConfigurationError(missing);
  }
  return { workspaceUrl: workspaceUrl.replace(/\/+$/, ""), clientId, clientSecret, dashboardId };
}

async function readJson(res: Response, step: MintStep): Promise<{ text: string; json: unknown }> {
  const text = await res.text();
  if (res.status !== 200) {
    throw new UpstreamTokenError(step, res.status, text);
  }
  try {
    return { text, json: JSON.parse(text) };
  } catch {
    throw new UpstreamTokenError(step, res.status, text, "body is not valid JSON");
  }
}

/**
 * Form body for the scoped grant: every token-info field except
 * `authorization_details`, then the grant type, then the authorization
 * details re-encoded as a JSON string.
 */
export function buildScopedTokenParams(tokenInfo: Record<string, unknown>): URLSearchParams {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(tokenInfo)) {
    if (key === "authorization_details") continue;
    params.append(key, typeof value === "string" ? value : JSON.stringify(value));
  }
  params.set("grant_type", "client_credentials");
  params.set("authorization_details", JSON.stringify(tokenInfo.authorization_details ?? null));
  return params;
}

/**
 * Create an embed token minter.
 *
 * Configuration is checked on every `mint` call, before any request is made,
 * so a server can start without workspace credentials and report the gap
 * per request.
 */
export function createEmbedTokenMinter(config: EmbedTokenMinterConfig, fetchFn: FetchFn = fetch): EmbedTokenMinter {
  async function requestToken(
    step: MintStep,
    tokenUrl: string,
    basicAuth: string,
    params: URLSearchParams,
  ): Promise<ScopedTokenResponse> {
    const res = await fetchFn(tokenUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: basicAuth,
      },
      body: params.toString(),
    });
    const { text, json } = await readJson(res, step);
    // Only the scoped token's lifetime reaches the client.
    const parsed =
      step === "scoped_token" ? scopedTokenResponseSchema.safeParse(json) : tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      const field = parsed.error.issues[0]?.path[0];
      throw new UpstreamTokenError(
        step,
        res.status,
        text,
        field === "expires_in" ? "invalid expires_in" : "missing access_token",
      );
    }
    return parsed.data;
  }

  async function fetchTokenInfo(
    settings: ResolvedSettings,
    broadToken: string,
    viewer: EmbedViewer,
  ): Promise<Record<string, unknown>> {
    const url =
      `${settings.workspaceUrl}/api/2.0/lakeview/dashboards/${encodeURIComponent(settings.dashboardId)}/published/tokeninfo` +
      `?external_viewer_id=${encodeURIComponent(viewer.email)}` +
      `&external_value=${encodeURIComponent(viewer.department)}`;
    const res = await fetchFn(url, {
      method: "GET",
      headers: { Authorization: `Bearer ${broadToken}` },
    });
    const { text, json } = await readJson(res, "token_info");
    const parsed = tokenInfoSchema.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamTokenError("token_info", res.status, text, "expected a JSON object");
    }
    return parsed.data;
  }

  return {
    async mint(viewer: EmbedViewer): Promise<TokenResult> {
      const settings = resolveSettings(config);
      const tokenUrl = `${settings.workspaceUrl}/oidc/v1/token`;
      const basicAuth = `Basic ${Buffer.from(`${settings.clientId}:${settings.clientSecret}`).toString("base64")}`;

      const broad = await requestToken(
        "oidc_token",
        tokenUrl,
        basicAuth,
        new URLSearchParams({ grant_type: "client_credentials", scope: "all-apis" }),
      );
      logger.debug("Obtained all-apis token", { userId: viewer.id });

      const tokenInfo = await fetchTokenInfo(settings, broad.access_token, viewer);
      logger.debug("Fetched dashboard token info", { userId: viewer.id, dashboardId: settings.dashboardId });

      const scoped = await requestToken("scoped_token", tokenUrl, basicAuth, buildScopedTokenParams(tokenInfo));
      const expiresIn = scoped.expires_in ?? DEFAULT_TOKEN_EXPIRES_IN;
      logger.info("Minted embed token", { userId: viewer.id, expiresIn });

      return {
        access_token: scoped.access_token,
        token_type: "Bearer",
        expires_in: expiresIn,
        created_at: Math.floor(Date.now() / 1000),
      };
    },
  };
}
