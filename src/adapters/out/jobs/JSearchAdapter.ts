import { err, Result, ResultAsync } from "neverthrow";
import type {
  JobSearchOptions,
  JobSearchRepository,
  JobSearchSettings,
} from "../../../application/ports/out/JobSearchRepository.ts";
import { info } from "../../../config/logger.ts";
import type { HttpError } from "../../../domain/models/http.ts";
import type { SearchQuery, SearchResult, ValidationError } from "../../../domain/models/jobs.ts";
import { HttpClient, HttpClientOptions } from "../http/HttpClient.ts";
import { RetryPolicy } from "../http/RetryPolicy.ts";
import { buildJSearchRequest } from "./JSearchRequestBuilder.ts";
import { normalizeJSearchResponse } from "./JSearchResponseNormalizer.ts";

/**
 * JSearch (RapidAPI) job search: build request, execute with retry, normalize
 */
export class JSearchAdapter implements JobSearchRepository {
  readonly id = "jsearch";
  readonly name = "JSearch";

  constructor(private readonly httpOptions: HttpClientOptions = {}) {}

  async search(
    query: SearchQuery,
    settings: JobSearchSettings,
    options: JobSearchOptions = {},
  ): Promise<Result<SearchResult, ValidationError | HttpError>> {
    const request = buildJSearchRequest(query, settings.upstream);
    if (request.isErr()) {
      return err(request.error);
    }

    const client = new HttpClient(RetryPolicy.fromSettings(settings.retry), this.httpOptions);
    const startedAt = Date.now();

    return await new ResultAsync(client.execute(request.value, options.signal))
      .andThen((raw) => normalizeJSearchResponse(raw, query.numResults))
      .map((result) => {
        info("JSearch search completed", {
          requested: result.requested,
          returned: result.returned,
          upstreamCount: result.upstreamCount,
          skipped: result.skipped.length,
          elapsedMs: Date.now() - startedAt,
        });
        return result;
      });
  }

  getId(): string {
    return this.id;
  }

  getName(): string {
    return this.name;
  }
}
