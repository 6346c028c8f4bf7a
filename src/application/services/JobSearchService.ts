import { err, Result } from "neverthrow";
import type { AppConfig, ConfigError } from "../../domain/models/config.ts";
import { createToolError, ToolError } from "../../domain/models/errors.ts";
import type { HttpError } from "../../domain/models/http.ts";
import type { JobSearchRequest, SearchQuery, SearchResult, ValidationError } from "../../domain/models/jobs.ts";
import { describeQuery, JobSearchSuccessResponse } from "../../domain/models/mcp.ts";
import { createSearchQuery } from "../../domain/entities/SearchQueryEntity.ts";
import { applySafetyCap } from "../../domain/entities/SearchResultEntity.ts";
import { error, info, warn } from "../../config/logger.ts";
import type { JobSearchUseCase } from "../ports/in/JobSearchUseCase.ts";
import type { ConfigProvider } from "../ports/out/ConfigProvider.ts";
import type { JobSearchOptions, JobSearchRepository } from "../ports/out/JobSearchRepository.ts";

/**
 * Implementation of the JobSearchUseCase port.
 * Every failure leaves this service as a ToolError with a stable code.
 */
export class JobSearchService implements JobSearchUseCase {
  constructor(
    private readonly configProvider: ConfigProvider,
    private readonly repository: JobSearchRepository,
  ) {}

  async searchJobs(
    request: JobSearchRequest,
    options: JobSearchOptions = {},
  ): Promise<Result<JobSearchSuccessResponse, ToolError>> {
    try {
      return await this.run(request, options);
    } catch (e) {
      error("Unexpected job search failure", {
        error: e instanceof Error ? e.message : String(e),
      });
      return err(createToolError("INTERNAL_ERROR", "Job search failed unexpectedly"));
    }
  }

  private async run(
    request: JobSearchRequest,
    options: JobSearchOptions,
  ): Promise<Result<JobSearchSuccessResponse, ToolError>> {
    const queryResult = createSearchQuery(request);
    if (queryResult.isErr()) {
      return err(fromValidationError(queryResult.error));
    }
    const query = queryResult.value;

    const configResult = await this.configProvider.resolve();
    if (configResult.isErr()) {
      warn("Configuration unavailable", { type: configResult.error.type });
      return err(fromConfigError(configResult.error));
    }
    const config = configResult.value;

    info("Job search request", {
      source: this.repository.getId(),
      role: query.role,
      city: query.city,
      country: query.country,
      platform: query.platform,
      numResults: query.numResults,
    });

    const searchResult = await this.repository.search(
      query,
      { upstream: config.upstream, retry: config.retry },
      options,
    );

    return searchResult
      .map((result) => this.toResponse(query, applySafetyCap(result, query)))
      .mapErr((e) => {
        const toolError = e.type === "validation"
          ? fromValidationError(e)
          : fromHttpError(e, config);
        warn("Job search failed", { code: toolError.code, message: toolError.message });
        return toolError;
      });
  }

  private toResponse(query: SearchQuery, result: SearchResult): JobSearchSuccessResponse {
    return {
      status: "success",
      source: this.repository.getId(),
      provider: this.repository.getName(),
      query: describeQuery(query),
      results: result.records,
      requested: result.requested,
      returned: result.returned,
      truncated: result.truncated,
      truncationReason: result.truncationReason,
      skipped: result.skipped.length,
      warnings: result.skipped,
    };
  }
}

function fromValidationError(e: ValidationError): ToolError {
  return createToolError("INVALID_ARGUMENT", e.message, { issues: e.issues });
}

function fromConfigError(e: ConfigError): ToolError {
  switch (e.type) {
    case "missingCredential":
      return createToolError("MISSING_CREDENTIAL", e.message);
    case "invalidConfig":
      return createToolError("INVALID_CONFIGURATION", e.message, { issues: e.issues });
  }
}

function fromHttpError(e: HttpError, config: AppConfig): ToolError {
  switch (e.type) {
    case "unauthorized":
      return config.upstream.apiKey
        ? createToolError("UPSTREAM_UNAUTHORIZED", e.message, { upstreamStatus: e.status })
        : createToolError(
          "MISSING_CREDENTIAL",
          "RAPIDAPI_KEY is not set and the job search API requires one",
          { upstreamStatus: e.status },
        );
    case "badRequest":
      return createToolError("INVALID_ARGUMENT", e.message, { upstreamStatus: e.status });
    case "malformedResponse":
      return createToolError("MALFORMED_UPSTREAM_RESPONSE", e.message);
    case "cancelled":
      return createToolError("CANCELLED", e.message);
    case "exhausted":
      return e.lastCause.type === "rateLimit"
        ? createToolError("UPSTREAM_RATE_LIMITED", e.message, {
          attempts: e.attempts,
          upstreamStatus: e.lastCause.status,
        })
        : createToolError("UPSTREAM_UNAVAILABLE", e.message, {
          attempts: e.attempts,
          upstreamStatus: e.lastCause.type === "server" ? e.lastCause.status : undefined,
        });
  }
}
