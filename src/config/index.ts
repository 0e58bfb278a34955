import { z } from "zod";

/** Treat blank env values as unset so `FOO=` in a .env file falls back to the default. */
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);

const optionalSetting = blankAsUnset(z.string().trim().optional());

export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_SESSION_COOKIE = "embed_session";

/** Connection settings for the analytics workspace that issues embed tokens. */
export const analyticsConfigSchema = z
  .object({
    workspaceUrl: optionalSetting,
    clientId: optionalSetting,
    clientSecret: optionalSetting,
    dashboardId: optionalSetting,
    workspaceId: optionalSetting,
    warehouseId: optionalSetting,
  })
  .default({});

export const configSchema = z.object({
  port: blankAsUnset(z.coerce.number().int().min(1).max(65535).default(5000)),
  host: blankAsUnset(z.string().min(1).default("0.0.0.0")),
  nodeEnv: blankAsUnset(z.enum(["development", "production", "test"]).default("development")),
  logLevel: blankAsUnset(z.enum(["error", "warn", "info", "debug"]).default("info")),

  /** The single frontend origin allowed to call the API with credentials. */
  uiOrigin: blankAsUnset(z.string().url().default("http://localhost:3000")),

  session: z
    .object({
      ttlMs: blankAsUnset(z.coerce.number().int().positive().default(DEFAULT_SESSION_TTL_MS)),
      cookieName: blankAsUnset(z.string().min(1).default(DEFAULT_SESSION_COOKIE)),
      /** SQLite file for sessions. Sessions stay in memory when unset. */
      dbPath: optionalSetting,
    })
    .default({
      ttlMs: DEFAULT_SESSION_TTL_MS,
      cookieName: DEFAULT_SESSION_COOKIE,
    }),

  /** JSON file replacing the built-in demo user directory. */
  demoUsersPath: optionalSetting,

  analytics: analyticsConfigSchema,
});

export type Config = z.infer<typeof configSchema>;
export type AnalyticsConfig = Config["analytics"];

/** Build the service configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    port: env.PORT,
    host: env.HOST,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    uiOrigin: env.UI_ORIGIN,
    session: {
      ttlMs: env.SESSION_TTL_MS,
      cookieName: env.SESSION_COOKIE_NAME,
      dbPath: env.SESSION_DB_PATH,
    },
    demoUsersPath: env.DEMO_USERS_PATH,
    analytics: {
      workspaceUrl: env.DATABRICKS_WORKSPACE_URL,
      clientId: env.DATABRICKS_CLIENT_ID,
      clientSecret: env.DATABRICKS_CLIENT_SECRET,
      dashboardId: env.DATABRICKS_DASHBOARD_ID,
      workspaceId: env.DATABRICKS_WORKSPACE_ID,
      warehouseId: env.DATABRICKS_WAREHOUSE_ID,
    },
  });
}

export const config = loadConfig();
