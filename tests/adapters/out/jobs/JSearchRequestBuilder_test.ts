import { expect, test } from "vitest";
import {
  buildJSearchRequest,
  composeSearchText,
} from "../../../../src/adapters/out/jobs/JSearchRequestBuilder.ts";
import type { UpstreamSettings } from "../../../../src/domain/models/config.ts";
import type { SearchQuery } from "../../../../src/domain/models/jobs.ts";

const upstream: UpstreamSettings = {
  apiKey: "test-secret",
  apiHost: "jsearch.p.rapidapi.com",
  timeoutMs: 10_000,
  requireApiKey: false,
};

function query(overrides: Partial<SearchQuery> = {}): SearchQuery {
  return { role: "data engineer", numResults: 5, requestedResults: 5, ...overrides };
}

test("composeSearchText omits empty location parts", () => {
  expect(composeSearchText("chef", "Lyon", "France")).toBe("chef in Lyon, France");
  expect(composeSearchText("chef", undefined, "France")).toBe("chef in France");
  expect(composeSearchText("chef", "  ", undefined)).toBe("chef");
});

test("buildJSearchRequest builds the search URL, params and headers", () => {
  const spec = buildJSearchRequest(
    query({ city: "Berlin", country: "Germany", platform: "linkedin" }),
    upstream,
  )._unsafeUnwrap();

  expect(spec.method).toBe("GET");
  expect(spec.timeoutMs).toBe(10_000);
  expect(spec.params).toEqual({
    query: "data engineer in Berlin, Germany via LinkedIn",
    page: "1",
    num_pages: "1",
  });
  expect(spec.headers).toEqual({
    "Accept": "application/json",
    "X-RapidAPI-Host": "jsearch.p.rapidapi.com",
    "X-RapidAPI-Key": "test-secret",
  });

  const url = new URL(spec.url);
  expect(url.origin).toBe("https://jsearch.p.rapidapi.com");
  expect(url.pathname).toBe("/search");
  expect(url.searchParams.get("query")).toBe("data engineer in Berlin, Germany via LinkedIn");
  expect(url.searchParams.get("country")).toBeNull();
});

test("buildJSearchRequest passes a two-letter country code through lowercased", () => {
  const spec = buildJSearchRequest(query({ country: "DE" }), upstream)._unsafeUnwrap();
  expect(spec.params.country).toBe("de");
  expect(new URL(spec.url).searchParams.get("country")).toBe("de");
});

test("buildJSearchRequest asks for enough pages to cover the result count", () => {
  expect(buildJSearchRequest(query({ numResults: 10 }), upstream)._unsafeUnwrap().params.num_pages)
    .toBe("1");
  expect(buildJSearchRequest(query({ numResults: 11 }), upstream)._unsafeUnwrap().params.num_pages)
    .toBe("2");
  expect(buildJSearchRequest(query({ numResults: 99 }), upstream)._unsafeUnwrap().params.num_pages)
    .toBe("2");
});

test("buildJSearchRequest leaves out the key header when no key is configured", () => {
  const spec = buildJSearchRequest(query(), { ...upstream, apiKey: undefined })._unsafeUnwrap();
  expect(Object.keys(spec.headers)).toEqual(["Accept", "X-RapidAPI-Host"]);
});

test("buildJSearchRequest rejects a blank role", () => {
  const error = buildJSearchRequest(query({ role: "  " }), upstream)._unsafeUnwrapErr();
  expect(error.reason).toBe("emptyRole");
});
