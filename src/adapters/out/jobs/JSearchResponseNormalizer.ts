import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { HttpError, RawResponse } from "../../../domain/models/http.ts";
import {
  JobRecord,
  RequiredListingField,
  SalaryRange,
  SearchResult,
  SkippedListing,
} from "../../../domain/models/jobs.ts";

export const DESCRIPTION_SNIPPET_LENGTH = 500;

const envelopeSchema = z.object({
  data: z.array(z.unknown()),
});

type Listing = Record<string, unknown>;

function isListing(value: unknown): value is Listing {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(listing: Listing, key: string): string | null {
  const value = listing[key];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readNumber(listing: Listing, key: string): number | null {
  const value = listing[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function readBoolean(listing: Listing, key: string): boolean | null {
  const value = listing[key];
  return typeof value === "boolean" ? value : null;
}

function toSnippet(description: string | null): string | null {
  if (description === null) return null;
  const collapsed = description.replace(/\s+/g, " ").trim();
  if (collapsed.length <= DESCRIPTION_SNIPPET_LENGTH) return collapsed;
  return `${collapsed.slice(0, DESCRIPTION_SNIPPET_LENGTH - 3).trimEnd()}...`;
}

function readSalary(listing: Listing): SalaryRange | null {
  const min = readNumber(listing, "job_min_salary");
  const max = readNumber(listing, "job_max_salary");
  if (min === null && max === null) return null;

  return {
    min,
    max,
    currency: readString(listing, "job_salary_currency"),
    period: readString(listing, "job_salary_period"),
  };
}

function readPostedAt(listing: Listing): string | null {
  const iso = readString(listing, "job_posted_at_datetime_utc");
  if (iso !== null) {
    const parsed = Date.parse(iso);
    if (!Number.isNaN(parsed)) return new Date(parsed).toISOString();
  }

  const timestamp = readNumber(listing, "job_posted_at_timestamp");
  if (timestamp === null) return null;

  // Outside the Date range; toISOString would throw
  const posted = new Date(timestamp * 1000);
  return Number.isNaN(posted.getTime()) ? null : posted.toISOString();
}

function readLocation(listing: Listing): string | null {
  const explicit = readString(listing, "job_location");
  if (explicit !== null) return explicit;

  const parts = ["job_city", "job_state", "job_country"]
    .map((key) => readString(listing, key))
    .filter((part): part is string => part !== null);
  return parts.length > 0 ? parts.join(", ") : null;
}

/**
 * Field-by-field extraction of one JSearch listing.
 * Returns the names of missing required fields instead of a record when any is absent.
 */
export function extractJobRecord(
  listing: Listing,
): Result<JobRecord, ReadonlyArray<RequiredListingField>> {
  const title = readString(listing, "job_title");
  const company = readString(listing, "employer_name");
  const url = readString(listing, "job_apply_link") ?? readString(listing, "job_google_link");

  if (title === null || company === null || url === null) {
    const missing: RequiredListingField[] = [];
    if (title === null) missing.push("title");
    if (company === null) missing.push("company");
    if (url === null) missing.push("url");
    return err(missing);
  }

  return ok({
    jobId: readString(listing, "job_id"),
    title,
    company,
    location: readLocation(listing),
    city: readString(listing, "job_city"),
    country: readString(listing, "job_country"),
    description: toSnippet(readString(listing, "job_description")),
    platform: readString(listing, "job_publisher"),
    url,
    employmentType: readString(listing, "job_employment_type"),
    isRemote: readBoolean(listing, "job_is_remote"),
    salary: readSalary(listing),
    postedAt: readPostedAt(listing),
  });
}

/**
 * Maps a JSearch response to a SearchResult, preserving upstream order.
 * Listings without a title, company or URL are skipped and reported, not fatal.
 */
export function normalizeJSearchResponse(
  raw: RawResponse,
  requested: number,
): Result<SearchResult, HttpError> {
  const envelope = envelopeSchema.safeParse(raw.body);
  if (!envelope.success) {
    return err({
      type: "malformedResponse",
      message: "Upstream response has no listing array",
    });
  }

  const listings = envelope.data.data;
  const records: JobRecord[] = [];
  const skipped: SkippedListing[] = [];

  for (const [index, listing] of listings.entries()) {
    if (records.length >= requested) break;

    if (!isListing(listing)) {
      skipped.push({ index, reason: "not_an_object", missing: [] });
      continue;
    }

    extractJobRecord(listing).match(
      (record) => {
        records.push(record);
      },
      (missing) => {
        skipped.push({ index, reason: "missing_required_fields", missing });
      },
    );
  }

  const truncated = listings.length < requested;

  return ok({
    records,
    requested,
    returned: records.length,
    upstreamCount: listings.length,
    truncated,
    truncationReason: truncated ? "fewer_upstream_matches" : null,
    skipped,
  });
}
