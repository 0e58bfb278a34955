import type { AnalyticsConfig } from "../config/index.js";
import { type DirectoryUser, toUserProfile, type UserProfile } from "../users/user-directory.js";
import type { TokenResult } from "./token-minter.js";

/** What the frontend needs to initialise the embedding SDK for one viewer. */
export interface EmbedConfigResponse {
  workspace_url: string | null;
  workspace_id: string | null;
  dashboard_id: string | null;
  warehouse_id: string | null;
  embed_token: string;
  token_expires_in: number;
  user_context: UserProfile;
}

export function buildEmbedConfig(analytics: AnalyticsConfig, user: DirectoryUser, token: TokenResult): EmbedConfigResponse {
  return {
    workspace_url: analytics.workspaceUrl ?? null,
    workspace_id: analytics.workspaceId ?? null,
    dashboard_id: analytics.dashboardId ?? null,
    warehouse_id: analytics.warehouseId ?? null,
    embed_token: token.access_token,
    token_expires_in: token.expires_in,
    user_context: toUserProfile(user),
  };
}
