import type { Result } from "neverthrow";
import type { UpstreamSettings, RetrySettings } from "../../../domain/models/config.ts";
import type { HttpError } from "../../../domain/models/http.ts";
import type { SearchQuery, SearchResult, ValidationError } from "../../../domain/models/jobs.ts";

export interface JobSearchSettings {
  readonly upstream: UpstreamSettings;
  readonly retry: RetrySettings;
}

export interface JobSearchOptions {
  readonly signal?: AbortSignal;
}

/**
 * Output port for job search providers
 */
export interface JobSearchRepository {
  search(
    query: SearchQuery,
    settings: JobSearchSettings,
    options?: JobSearchOptions,
  ): Promise<Result<SearchResult, ValidationError | HttpError>>;

  getId(): string;

  getName(): string;
}
