export const SUPPORTED_PLATFORMS = ["linkedin", "indeed", "glassdoor"] as const;

export type Platform = typeof SUPPORTED_PLATFORMS[number];

export const DEFAULT_RESULTS = 5;
export const MAX_RESULTS = 20;

/**
 * Logical job search arguments as received from a caller, before validation
 */
export interface JobSearchRequest {
  readonly role: string;
  readonly city?: string;
  readonly country?: string;
  readonly platform?: string;
  readonly numJobs?: number;
}

/**
 * Validated, immutable search query
 */
export interface SearchQuery {
  readonly role: string;
  readonly city?: string;
  readonly country?: string;
  readonly platform?: Platform;
  /** Result count after clamping to [1, MAX_RESULTS] */
  readonly numResults: number;
  /** Result count the caller asked for */
  readonly requestedResults: number;
}

export interface SalaryRange {
  readonly min: number | null;
  readonly max: number | null;
  readonly currency: string | null;
  readonly period: string | null;
}

/**
 * Normalized job listing. Absent upstream fields are null, never guessed.
 */
export interface JobRecord {
  readonly jobId: string | null;
  readonly title: string;
  readonly company: string;
  readonly location: string | null;
  readonly city: string | null;
  readonly country: string | null;
  readonly description: string | null;
  readonly platform: string | null;
  readonly url: string;
  readonly employmentType: string | null;
  readonly isRemote: boolean | null;
  readonly salary: SalaryRange | null;
  readonly postedAt: string | null;
}

export type RequiredListingField = "title" | "company" | "url";

export interface SkippedListing {
  readonly index: number;
  readonly reason: "missing_required_fields" | "not_an_object";
  readonly missing: ReadonlyArray<RequiredListingField>;
}

export type TruncationReason = "fewer_upstream_matches" | "safety_cap";

export interface SearchResult {
  readonly records: ReadonlyArray<JobRecord>;
  readonly requested: number;
  readonly returned: number;
  readonly upstreamCount: number;
  readonly truncated: boolean;
  readonly truncationReason: TruncationReason | null;
  readonly skipped: ReadonlyArray<SkippedListing>;
}

export type ValidationReason =
  | "emptyRole"
  | "invalidPlatform"
  | "cityWithoutCountry"
  | "invalidNumResults";

export interface ValidationError {
  readonly type: "validation";
  readonly reason: ValidationReason;
  readonly message: string;
  readonly issues: ReadonlyArray<string>;
}
