export interface UpstreamSettings {
  readonly apiKey?: string;
  readonly apiHost: string;
  readonly timeoutMs: number;
  readonly requireApiKey: boolean;
}

export interface RetrySettings {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterRatio: number;
}

export interface AppConfig {
  readonly appName: string;
  readonly appVersion: string;
  readonly port: number;
  readonly resumeMeshFilename: string;
  readonly upstream: UpstreamSettings;
  readonly retry: RetrySettings;
}

export type ConfigError =
  | { type: "invalidConfig"; message: string; issues: ReadonlyArray<string> }
  | { type: "missingCredential"; message: string };
