import type { Result } from "neverthrow";
import type { ToolError } from "../../../domain/models/errors.ts";
import type { JobSearchRequest } from "../../../domain/models/jobs.ts";
import type { JobSearchSuccessResponse } from "../../../domain/models/mcp.ts";
import type { JobSearchOptions } from "../out/JobSearchRepository.ts";

/**
 * Input port for job search
 * Used by the MCP tool and the HTTP controller alike
 */
export interface JobSearchUseCase {
  searchJobs(
    request: JobSearchRequest,
    options?: JobSearchOptions,
  ): Promise<Result<JobSearchSuccessResponse, ToolError>>;
}
