import { createToolError, getErrorStatusCode, ToolError } from "../../../domain/models/errors.ts";
import { createJobSearchErrorResponse } from "../../../domain/models/mcp.ts";

/**
 * JSON error envelope with the HTTP status mapped from the error code.
 * 499 is outside Hono's status union, hence Response.json.
 */
export function createErrorResponse(error: ToolError, status = getErrorStatusCode(error)): Response {
  return Response.json(createJobSearchErrorResponse(error), { status });
}

export function notFoundResponse(path: string): Response {
  return createErrorResponse(
    createToolError("INVALID_ARGUMENT", `No route for ${path}`),
    404,
  );
}

export function internalErrorResponse(): Response {
  return createErrorResponse(createToolError("INTERNAL_ERROR", "Internal Server Error"));
}
