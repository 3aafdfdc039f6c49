/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup — fail fast if misconfigured.
 */

export interface AppConfig {
  database: {
    /** When unset, audit entries are kept in memory */
    url?: string;
  };
  api: {
    port: number;
    host: string;
    corsOrigin?: string;
    rateLimitMax?: number;
    rateLimitWindowMs: number;
  };
  templates: {
    /** Directory of extra JSON templates loaded at startup */
    dir?: string;
  };
  engine: {
    collaboratorTimeoutMs: number;
    bulkMaxConcurrency: number;
  };
  audit: {
    backlogLimit: number;
    retryIntervalMs: number;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Reads a positive integer variable, falling back to `fallback` when unset.
 * Throws when the value is present but not a positive integer.
 */
function readPositiveInt(env: Env, name: string, fallback: number): number;
function readPositiveInt(env: Env, name: string): number | undefined;
function readPositiveInt(env: Env, name: string, fallback?: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(
      `${name} must be a positive integer, got "${raw}". See .env.example.`
    );
  }
  return value;
}

function readOptional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Loads configuration from process.env (or the given environment).
 * Throws immediately if a numeric variable is malformed.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = readPositiveInt(env, "API_PORT", 4000);
  if (port > 65_535) {
    throw new Error(`API_PORT must be a valid port number, got "${port}".`);
  }

  return {
    database: {
      url: readOptional(env, "DATABASE_URL"),
    },
    api: {
      port,
      host: env.API_HOST ?? "0.0.0.0",
      corsOrigin: readOptional(env, "CORS_ORIGIN"),
      rateLimitMax: readPositiveInt(env, "RATE_LIMIT_MAX"),
      rateLimitWindowMs: readPositiveInt(env, "RATE_LIMIT_WINDOW_MS", 60_000),
    },
    templates: {
      dir: readOptional(env, "TEMPLATES_DIR"),
    },
    engine: {
      collaboratorTimeoutMs: readPositiveInt(env, "COLLABORATOR_TIMEOUT_MS", 5_000),
      bulkMaxConcurrency: readPositiveInt(env, "BULK_MAX_CONCURRENCY", 5),
    },
    audit: {
      backlogLimit: readPositiveInt(env, "AUDIT_BACKLOG_LIMIT", 1_000),
      retryIntervalMs: readPositiveInt(env, "AUDIT_RETRY_INTERVAL_MS", 30_000),
    },
  };
}
