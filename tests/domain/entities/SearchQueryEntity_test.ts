import { expect, test } from "vitest";
import {
  clampNumResults,
  createSearchQuery,
  normalizePlatform,
  normalizeText,
} from "../../../src/domain/entities/SearchQueryEntity.ts";

test("createSearchQuery trims text and applies the default result count", () => {
  const result = createSearchQuery({ role: "  data   engineer ", city: " Berlin ", country: "Germany" });

  expect(result.isOk()).toBe(true);
  expect(result._unsafeUnwrap()).toEqual({
    role: "data engineer",
    city: "Berlin",
    country: "Germany",
    platform: undefined,
    numResults: 5,
    requestedResults: 5,
  });
});

test("createSearchQuery returns a frozen query", () => {
  const query = createSearchQuery({ role: "nurse" })._unsafeUnwrap();
  expect(Object.isFrozen(query)).toBe(true);
});

test("createSearchQuery rejects an empty role", () => {
  const error = createSearchQuery({ role: "   " })._unsafeUnwrapErr();
  expect(error.type).toBe("validation");
  expect(error.reason).toBe("emptyRole");
  expect(error.message).toBe("Job role is required");
});

test("createSearchQuery rejects a city without a country", () => {
  const error = createSearchQuery({ role: "chef", city: "Lyon" })._unsafeUnwrapErr();
  expect(error.reason).toBe("cityWithoutCountry");
});

test("createSearchQuery accepts a country without a city", () => {
  const query = createSearchQuery({ role: "chef", country: "France" })._unsafeUnwrap();
  expect(query.city).toBeUndefined();
  expect(query.country).toBe("France");
});

test("createSearchQuery rejects a fractional result count", () => {
  const error = createSearchQuery({ role: "chef", numJobs: 2.5 })._unsafeUnwrapErr();
  expect(error.reason).toBe("invalidNumResults");
});

test("createSearchQuery clamps result counts and keeps the requested number", () => {
  const high = createSearchQuery({ role: "chef", numJobs: 50 })._unsafeUnwrap();
  expect(high.numResults).toBe(20);
  expect(high.requestedResults).toBe(50);

  const low = createSearchQuery({ role: "chef", numJobs: 0 })._unsafeUnwrap();
  expect(low.numResults).toBe(1);
  expect(low.requestedResults).toBe(0);
});

test("createSearchQuery lowercases a known platform and rejects unknown ones", () => {
  expect(createSearchQuery({ role: "chef", platform: "LinkedIn" })._unsafeUnwrap().platform)
    .toBe("linkedin");

  const error = createSearchQuery({ role: "chef", platform: "monster" })._unsafeUnwrapErr();
  expect(error.reason).toBe("invalidPlatform");
  expect(error.issues).toEqual(["platform must be one of linkedin, indeed, glassdoor, or empty"]);
});

test("normalizePlatform treats blank input as no filter", () => {
  expect(normalizePlatform("  ")._unsafeUnwrap()).toBeUndefined();
  expect(normalizePlatform(undefined)._unsafeUnwrap()).toBeUndefined();
});

test("normalizeText collapses whitespace and drops blank values", () => {
  expect(normalizeText(" a \t b\n c ")).toBe("a b c");
  expect(normalizeText("\n ")).toBeUndefined();
});

test("clampNumResults keeps values inside 1..20", () => {
  expect(clampNumResults(-3)).toBe(1);
  expect(clampNumResults(7)).toBe(7);
  expect(clampNumResults(21)).toBe(20);
});
