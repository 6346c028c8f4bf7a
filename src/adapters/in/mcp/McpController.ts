import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { JobSearchUseCase } from "../../../application/ports/in/JobSearchUseCase.ts";
import { createToolError, ToolError } from "../../../domain/models/errors.ts";
import {
  createJobSearchErrorResponse,
  JobSearchResponse,
  McpSearchJobsArgs,
  toJobSearchRequest,
} from "../../../domain/models/mcp.ts";
import { error, info, warn } from "../../../config/logger.ts";

export const SEARCH_JOBS_TOOL = "search_jobs";

// Any JSON value passes the SDK; searchJobsArgsSchema maps bad values to INVALID_ARGUMENT.
const searchJobsShape = {
  role: z.unknown().describe("Job role or title to search for, e.g. \"data engineer\" (string, required)"),
  city: z.unknown().describe("City to search in; requires country (string)"),
  country: z.unknown().describe("Country name or two-letter code (string)"),
  platform: z.unknown().describe("linkedin, indeed, glassdoor, or empty for all (string)"),
  num_jobs: z.unknown().describe("Number of listings to return (integer 1-20, default 5)"),
};

const optionalText = z.string({ invalid_type_error: "must be a string" })
  .nullish()
  .transform((value) => value ?? undefined);

const searchJobsArgsSchema = z.object({
  role: z.string({ invalid_type_error: "must be a string" })
    .nullish()
    .transform((value) => value ?? ""),
  city: optionalText,
  country: optionalText,
  platform: optionalText,
  num_jobs: z.union([
    z.number(),
    z.string().trim().regex(/^-?\d+$/, "num_jobs must be an integer").transform(Number),
  ])
    .nullish()
    .transform((value) => value ?? undefined),
});

export function parseSearchJobsArgs(args: unknown): Result<McpSearchJobsArgs, ToolError> {
  const parsed = searchJobsArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return err(createToolError("INVALID_ARGUMENT", "Invalid search_jobs arguments", { issues }));
  }
  return ok(parsed.data);
}

/**
 * Controller for the search_jobs MCP tool
 */
export class McpController {
  constructor(private readonly jobSearchUseCase: JobSearchUseCase) {}

  registerJobSearchTool(server: McpServer): void {
    server.tool(
      SEARCH_JOBS_TOOL,
      "Search job listings by role, location and platform. Returns normalized listings as JSON.",
      searchJobsShape,
      async (params, extra) => {
        info("MCP search_jobs request", { role: params.role, platform: params.platform });
        return await this.handleSearchJobs(params, extra.signal);
      },
    );
  }

  async handleSearchJobs(args: unknown, signal?: AbortSignal): Promise<CallToolResult> {
    const parsed = parseSearchJobsArgs(args);
    if (parsed.isErr()) {
      warn("search_jobs arguments rejected", { issues: parsed.error.details?.issues });
      return this.toToolResult(createJobSearchErrorResponse(parsed.error));
    }

    const result = await this.jobSearchUseCase
      .searchJobs(toJobSearchRequest(parsed.value), { signal })
      .catch((e: unknown) => {
        error("search_jobs handler failed", { error: e instanceof Error ? e.message : String(e) });
        return null;
      });

    if (result === null) {
      return this.toToolResult(
        createJobSearchErrorResponse(createToolError("INTERNAL_ERROR", "Job search failed unexpectedly")),
      );
    }

    return result.match(
      (response) => this.toToolResult(response),
      (toolError) => this.toToolResult(createJobSearchErrorResponse(toolError)),
    );
  }

  private toToolResult(response: JobSearchResponse): CallToolResult {
    const content: CallToolResult["content"] = [
      { type: "text", text: JSON.stringify(response, null, 2) },
    ];
    return response.status === "error" ? { content, isError: true } : { content };
  }
}
