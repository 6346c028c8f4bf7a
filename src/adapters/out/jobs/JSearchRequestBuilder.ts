import { err, ok, Result } from "neverthrow";
import type { UpstreamSettings } from "../../../domain/models/config.ts";
import type { HttpRequestSpec } from "../../../domain/models/http.ts";
import type { Platform, SearchQuery, ValidationError } from "../../../domain/models/jobs.ts";
import {
  clampNumResults,
  normalizeText,
  validationError,
} from "../../../domain/entities/SearchQueryEntity.ts";

export const JSEARCH_PAGE_SIZE = 10;
const JSEARCH_SEARCH_PATH = "/search";

// Google Jobs publisher filter, understood by JSearch inside the query text
const PLATFORM_FILTERS: Record<Platform, string> = {
  linkedin: "via LinkedIn",
  indeed: "via Indeed",
  glassdoor: "via Glassdoor",
};

/**
 * "<role> in <city>, <country>", dropping whichever location parts are empty
 */
export function composeSearchText(role: string, city?: string, country?: string): string {
  const location = [normalizeText(city), normalizeText(country)]
    .filter((part): part is string => part !== undefined)
    .join(", ");

  return location ? `${role} in ${location}` : role;
}

export function buildJSearchRequest(
  query: SearchQuery,
  upstream: UpstreamSettings,
): Result<HttpRequestSpec, ValidationError> {
  const role = normalizeText(query.role);
  if (!role) {
    return err(validationError("emptyRole", "Job role is required"));
  }

  const numResults = clampNumResults(query.numResults);
  const searchText = query.platform
    ? `${composeSearchText(role, query.city, query.country)} ${PLATFORM_FILTERS[query.platform]}`
    : composeSearchText(role, query.city, query.country);

  const params: Record<string, string> = {
    query: searchText,
    page: "1",
    num_pages: String(Math.ceil(numResults / JSEARCH_PAGE_SIZE)),
  };

  const country = normalizeText(query.country);
  if (country && /^[a-zA-Z]{2}$/.test(country)) {
    params.country = country.toLowerCase();
  }

  const headers: Record<string, string> = {
    "Accept": "application/json",
    "X-RapidAPI-Host": upstream.apiHost,
  };
  if (upstream.apiKey) {
    headers["X-RapidAPI-Key"] = upstream.apiKey;
  }

  const urlParams = new URLSearchParams(params);

  return ok({
    method: "GET",
    url: `https://${upstream.apiHost}${JSEARCH_SEARCH_PATH}?${urlParams.toString()}`,
    params,
    headers,
    timeoutMs: upstream.timeoutMs,
  });
}
