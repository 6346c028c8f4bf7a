import { Context, Hono } from "hono";
import { z } from "zod";
import type { JobSearchUseCase } from "../../../application/ports/in/JobSearchUseCase.ts";
import { createToolError } from "../../../domain/models/errors.ts";
import type { JobSearchRequest } from "../../../domain/models/jobs.ts";
import { createErrorResponse } from "./errors.ts";

const searchQuerySchema = z.object({
  role: z.string().default(""),
  city: z.string().optional(),
  country: z.string().optional(),
  platform: z.string().optional(),
  num_jobs: z.string().trim().regex(/^-?\d+$/, "num_jobs must be an integer")
    .transform(Number)
    .optional(),
});

/**
 * Controller for HTTP API endpoints
 */
export class JobSearchController {
  constructor(private readonly jobSearchUseCase: JobSearchUseCase) {}

  createRouter(): Hono {
    const router = new Hono();

    router.get("/jobs/search", async (c) => {
      return await this.handleSearchRequest(c);
    });

    return router;
  }

  private async handleSearchRequest(c: Context): Promise<Response> {
    const parsed = searchQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      return createErrorResponse(createToolError("INVALID_ARGUMENT", "Invalid query parameters", { issues }));
    }

    const request: JobSearchRequest = {
      role: parsed.data.role,
      city: parsed.data.city,
      country: parsed.data.country,
      platform: parsed.data.platform,
      numJobs: parsed.data.num_jobs,
    };

    const result = await this.jobSearchUseCase.searchJobs(request, { signal: c.req.raw.signal });

    return result.match(
      (response) => c.json(response),
      (error) => createErrorResponse(error),
    );
  }
}
