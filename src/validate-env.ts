import { existsSync } from "node:fs";

const MINT_VARS = [
  "DATABRICKS_WORKSPACE_URL",
  "DATABRICKS_CLIENT_ID",
  "DATABRICKS_CLIENT_SECRET",
  "DATABRICKS_DASHBOARD_ID",
] as const;

const CLIENT_VARS = ["DATABRICKS_WORKSPACE_ID", "DATABRICKS_WAREHOUSE_ID"] as const;

const isUnset = (value: string | undefined): boolean => value === undefined || value.trim() === "";

/**
 * Startup environment variable validation.
 *
 * Throws on settings the server cannot start with. Warns on missing analytics
 * workspace settings: login and health still work, embed-config answers 500.
 * Skipped in test environment.
 */
export function validateRequiredEnvVars(env: NodeJS.ProcessEnv = process.env): void {
  if (env.NODE_ENV === "test") return;

  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical ---

  if (env.NODE_ENV === "production" && isUnset(env.UI_ORIGIN)) {
    errors.push("UI_ORIGIN is required in production (the default only suits local development)");
  }

  const usersPath = env.DEMO_USERS_PATH;
  if (usersPath !== undefined && !isUnset(usersPath) && !existsSync(usersPath)) {
    errors.push(`DEMO_USERS_PATH points at a missing file: ${usersPath}`);
  }

  // --- Recommended (embedding will fail without these) ---

  const missingMint = MINT_VARS.filter((name) => isUnset(env[name]));
  if (missingMint.length > 0) {
    warnings.push(`Missing ${missingMint.join(", ")}. Embed token requests will fail until these are set.`);
  }

  const missingClient = CLIENT_VARS.filter((name) => isUnset(env[name]));
  if (missingClient.length > 0) {
    warnings.push(`Missing ${missingClient.join(", ")}. Embed configurations will carry null for these ids.`);
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`[env] WARNING: ${w}`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
