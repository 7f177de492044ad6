/**
 * Environment configuration for the KYC intake MCP server.
 * Reads all secrets from process.env; never hardcode credentials.
 * Copy .env.example to .env and populate before running locally.
 */

type Env = Record<string, string | undefined>;

function required(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
        `Copy .env.example to .env and populate it.`
    );
  }
  return value;
}

function optional(env: Env, key: string, defaultValue = ""): string {
  return env[key] ?? defaultValue;
}

function optionalNumber(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return defaultValue;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive number, got "${raw}"`);
  }
  return parsed;
}

export function loadConfig(env: Env = process.env) {
  return {
    extraction: {
      apiKey: required(env, "ANTHROPIC_API_KEY"),
      model: optional(env, "KYC_EXTRACTION_MODEL", "claude-sonnet-4-20250514"),
      timeoutMs: optionalNumber(env, "KYC_EXTRACTION_TIMEOUT_MS", 120_000),
    },
    normaliser: {
      /** Relative disagreement allowed before a provided total is recomputed. */
      totalsTolerance: optionalNumber(env, "KYC_TOTALS_TOLERANCE", 0.01),
    },
    /** Rendering is disabled when no templates directory is configured. */
    rendering: {
      templatesDir: optional(env, "KYC_TEMPLATES_DIR"),
      outputDir: optional(env, "KYC_OUTPUT_DIR", "./output"),
      dealingRep: optional(env, "KYC_DEALING_REP"),
    },
    /** Notification runs only when the key, sender and recipients are all set. */
    notification: {
      resendApiKey: optional(env, "RESEND_API_KEY"),
      to: optional(env, "KYC_NOTIFICATION_EMAIL"),
      from: optional(env, "KYC_FROM_EMAIL"),
    },
    intake: {
      maxRetainedResults: optionalNumber(env, "KYC_MAX_RETAINED_RESULTS", 1000),
    },
    logLevel: optional(env, "LOG_LEVEL", "info"),
  } as const;
}

export type Config = ReturnType<typeof loadConfig>;
