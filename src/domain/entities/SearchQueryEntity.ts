import { err, ok, Result } from "neverthrow";
import {
  DEFAULT_RESULTS,
  JobSearchRequest,
  MAX_RESULTS,
  Platform,
  SearchQuery,
  SUPPORTED_PLATFORMS,
  ValidationError,
  ValidationReason,
} from "../models/jobs.ts";

export function validationError(
  reason: ValidationReason,
  message: string,
  issues: ReadonlyArray<string> = [message],
): ValidationError {
  return { type: "validation", reason, message, issues };
}

/**
 * Trims and collapses internal whitespace. Blank input becomes undefined.
 */
export function normalizeText(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const collapsed = value.trim().replace(/\s+/g, " ");
  return collapsed.length > 0 ? collapsed : undefined;
}

export function clampNumResults(value: number): number {
  return Math.min(MAX_RESULTS, Math.max(1, value));
}

function isPlatform(value: string): value is Platform {
  return (SUPPORTED_PLATFORMS as ReadonlyArray<string>).includes(value);
}

export function normalizePlatform(
  value: string | undefined,
): Result<Platform | undefined, ValidationError> {
  const normalized = normalizeText(value)?.toLowerCase();
  if (normalized === undefined) return ok(undefined);

  if (!isPlatform(normalized)) {
    return err(
      validationError(
        "invalidPlatform",
        `Unsupported platform "${normalized}"`,
        [`platform must be one of ${SUPPORTED_PLATFORMS.join(", ")}, or empty`],
      ),
    );
  }

  return ok(normalized);
}

/**
 * Validates caller arguments into an immutable SearchQuery.
 * Out-of-range result counts are clamped rather than rejected.
 */
export function createSearchQuery(
  request: JobSearchRequest,
): Result<SearchQuery, ValidationError> {
  const role = normalizeText(request.role);
  if (!role) {
    return err(validationError("emptyRole", "Job role is required"));
  }

  const city = normalizeText(request.city);
  const country = normalizeText(request.country);
  if (city && !country) {
    return err(
      validationError("cityWithoutCountry", "A country is required when a city is given"),
    );
  }

  const requestedResults = request.numJobs ?? DEFAULT_RESULTS;
  if (!Number.isInteger(requestedResults)) {
    return err(
      validationError("invalidNumResults", "num_jobs must be an integer"),
    );
  }

  return normalizePlatform(request.platform).map((platform) =>
    Object.freeze({
      role,
      city,
      country,
      platform,
      numResults: clampNumResults(requestedResults),
      requestedResults,
    })
  );
}
