import { MAX_RESULTS, SearchQuery, SearchResult } from "../models/jobs.ts";

/**
 * Marks a result as capped when the caller asked for more than MAX_RESULTS
 */
export function applySafetyCap(result: SearchResult, query: SearchQuery): SearchResult {
  if (result.truncated || query.requestedResults <= MAX_RESULTS) {
    return result;
  }

  return {
    ...result,
    requested: query.requestedResults,
    truncated: true,
    truncationReason: "safety_cap",
  };
}
