import type { ToolError } from "./errors.ts";
import type { JobRecord, JobSearchRequest, SearchQuery, SkippedListing, TruncationReason } from "./jobs.ts";

/**
 * Arguments of the search_jobs tool, named as they appear on the wire
 */
export interface McpSearchJobsArgs {
  readonly role: string;
  readonly city?: string;
  readonly country?: string;
  readonly platform?: string;
  readonly num_jobs?: number;
}

export interface JobSearchSuccessResponse {
  readonly status: "success";
  readonly source: string;
  readonly provider: string;
  readonly query: {
    readonly role: string;
    readonly city: string | null;
    readonly country: string | null;
    readonly platform: string | null;
    readonly numJobs: number;
  };
  readonly results: ReadonlyArray<JobRecord>;
  readonly requested: number;
  readonly returned: number;
  readonly truncated: boolean;
  readonly truncationReason: TruncationReason | null;
  readonly skipped: number;
  readonly warnings: ReadonlyArray<SkippedListing>;
}

export interface JobSearchErrorResponse {
  readonly status: "error";
  readonly error: ToolError;
}

export type JobSearchResponse = JobSearchSuccessResponse | JobSearchErrorResponse;

export function toJobSearchRequest(args: McpSearchJobsArgs): JobSearchRequest {
  return {
    role: args.role,
    city: args.city,
    country: args.country,
    platform: args.platform,
    numJobs: args.num_jobs,
  };
}

export function describeQuery(query: SearchQuery): JobSearchSuccessResponse["query"] {
  return {
    role: query.role,
    city: query.city ?? null,
    country: query.country ?? null,
    platform: query.platform ?? null,
    numJobs: query.numResults,
  };
}

export function createJobSearchErrorResponse(error: ToolError): JobSearchErrorResponse {
  return {
    status: "error",
    error,
  };
}
