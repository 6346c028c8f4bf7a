import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { ConfigProvider } from "../application/ports/out/ConfigProvider.ts";
import type { AppConfig, ConfigError } from "../domain/models/config.ts";

export type EnvSource = Readonly<Record<string, string | undefined>>;

const HOST_PATTERN = /^[a-zA-Z0-9\-.]+\.[a-zA-Z]{2,}$/;
const VERSION_PATTERN = /^\d+\.\d+\.\d+(-[a-zA-Z0-9]+)?$/;
const BACKOFF_JITTER_RATIO = 0.3;

const booleanFlag = (fallback: boolean) =>
  z.string().toLowerCase().pipe(z.enum(["true", "false", "1", "0"])).optional()
    .transform((value) => value === undefined ? fallback : value === "true" || value === "1");

const envSchema = z.object({
  APP_NAME: z.string()
    .transform((value) => value.toLowerCase().replace(/[^a-z0-9_-]/g, ""))
    .pipe(z.string().min(1, "APP_NAME must contain an alphanumeric character").max(50))
    .default("iam"),
  APP_VERSION: z.string().regex(VERSION_PATTERN, "APP_VERSION must look like X.Y.Z or X.Y.Z-suffix")
    .default("1.0.0"),
  RAPIDAPI_KEY: z.string().optional(),
  RAPIDAPI_HOST: z.string().regex(HOST_PATTERN, "RAPIDAPI_HOST must be a hostname")
    .default("jsearch.p.rapidapi.com"),
  JOB_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  JOB_SEARCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  JOB_SEARCH_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  JOB_SEARCH_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(30_000),
  JOB_SEARCH_REQUIRE_API_KEY: booleanFlag(false),
  PORT: z.coerce.number().int().min(1).max(65535).default(8088),
  RESUME_MESH_FILENAME: z.string()
    .regex(/^[a-zA-Z0-9_-]+$/, "RESUME_MESH_FILENAME may only contain letters, digits, - and _")
    .default("resume_mesh"),
});

/**
 * Drops unset and blank variables so schema defaults apply to them
 */
function presentValues(env: EnvSource): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      values[key] = value.trim();
    }
  }
  return values;
}

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(env: EnvSource): Result<AppConfig, ConfigError> {
  const parsed = envSchema.safeParse(presentValues(env));
  if (!parsed.success) {
    return err({
      type: "invalidConfig",
      message: "Configuration is invalid",
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  const values = parsed.data;
  if (values.JOB_SEARCH_REQUIRE_API_KEY && !values.RAPIDAPI_KEY) {
    return err({
      type: "missingCredential",
      message: "RAPIDAPI_KEY is not set but JOB_SEARCH_REQUIRE_API_KEY is enabled",
    });
  }

  return ok(Object.freeze({
    appName: values.APP_NAME,
    appVersion: values.APP_VERSION,
    port: values.PORT,
    resumeMeshFilename: values.RESUME_MESH_FILENAME,
    upstream: Object.freeze({
      apiKey: values.RAPIDAPI_KEY,
      apiHost: values.RAPIDAPI_HOST,
      timeoutMs: values.JOB_SEARCH_TIMEOUT_MS,
      requireApiKey: values.JOB_SEARCH_REQUIRE_API_KEY,
    }),
    retry: Object.freeze({
      maxAttempts: values.JOB_SEARCH_MAX_ATTEMPTS,
      baseDelayMs: values.JOB_SEARCH_BASE_DELAY_MS,
      maxDelayMs: values.JOB_SEARCH_MAX_DELAY_MS,
      jitterRatio: BACKOFF_JITTER_RATIO,
    }),
  }));
}

/**
 * Resolves configuration once. Concurrent first callers share one pending
 * resolution; a failed resolution is not kept, so a later call retries.
 */
export class ConfigResolver implements ConfigProvider {
  private pending?: Promise<Result<AppConfig, ConfigError>>;

  constructor(private readonly env: EnvSource = process.env) {}

  resolve(): Promise<Result<AppConfig, ConfigError>> {
    if (!this.pending) {
      this.pending = Promise.resolve().then(() => {
        const result = loadConfig(this.env);
        if (result.isErr()) {
          this.pending = undefined;
        }
        return result;
      });
    }
    return this.pending;
  }
}
