import type { Result } from "neverthrow";
import type { AppConfig, ConfigError } from "../../../domain/models/config.ts";

/**
 * Output port for lazily resolved, read-only configuration
 */
export interface ConfigProvider {
  resolve(): Promise<Result<AppConfig, ConfigError>>;
}
