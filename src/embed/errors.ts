/** The three upstream calls of a token mint, in order. */
export type MintStep = "oidc_token" | "token_info" | "scoped_token";

const STEP_LABELS: Record<MintStep, string> = {
  oidc_token: "OIDC token request",
  token_info: "Dashboard token info request",
  scoped_token: "Scoped token request",
};

/** Thrown before any network call when required workspace settings are missing. */
export class EmbedConfigurationError extends Error {
  /** Environment variable names that are unset. */
  readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super(`Missing required analytics workspace configuration: ${missing.join(", ")}`);
    this.name = "EmbedConfigurationError";
    this.missing = missing;
  }
}

/** A step of the token exchange answered with something other than a usable 200. */
export class UpstreamTokenError extends Error {
  readonly step: MintStep;
  readonly status: number;
  /** Raw response body as returned by the workspace. */
  readonly body: string;

  constructor(step: MintStep, status: number, body: string, problem?: string) {
    super(
      problem
        ? `${STEP_LABELS[step]} returned an unusable response (${status}): ${problem}`
        : `${STEP_LABELS[step]} failed (${status}): ${body}`,
    );
    this.name = "UpstreamTokenError";
    this.step = step;
    this.status = status;
    this.body = body;
  }
}
