import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ErrorCode, GetPromptResult, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { Result } from "neverthrow";
import { z } from "zod";
import type { PromptError, PromptService } from "../../../application/services/PromptService.ts";
import { debug, warn } from "../../../config/logger.ts";

const analyzeJobMarketArgs = {
  role: z.string().describe("Job role or title to analyze"),
  city: z.string().optional().describe("City to focus on (requires country)"),
  country: z.string().optional().describe("Country to focus on"),
  platform: z.string().optional().describe("linkedin, indeed, glassdoor, or empty"),
  num_jobs: z.string().optional().describe("Number of listings to analyze (1-20, default 5)"),
};

const saveJobsArgs = {
  jobs_dir: z.string().describe("Directory to save the jobs file in"),
  date: z.string().describe("Date of the search, YYYY-MM-DD"),
  role: z.string().describe("Role that was searched for"),
  city: z.string().optional().describe("City that was searched in"),
  country: z.string().optional().describe("Country that was searched in"),
  num_jobs: z.string().optional().describe("Number of jobs to save (1-100, default 5)"),
};

const meshResumesArgs = {
  save_directory: z.string().describe("Directory to save the resume mesh in"),
  date: z.string().describe("Date used in the file name, YYYY-MM-DD"),
  resume_mesh_filename: z.string().optional().describe("Base file name, without extension"),
};

const tailoredDocumentArgs = {
  save_directory: z.string().describe("Directory to save the document in"),
  role: z.string().describe("Role applied for"),
  company: z.string().describe("Company applied to"),
  job_description: z.string().describe("Full job description text"),
};

function toPromptResult(name: string, result: Result<string, PromptError>): GetPromptResult {
  return result.match(
    (text): GetPromptResult => {
      debug("Prompt rendered", { name, length: text.length });
      return {
        messages: [{ role: "user", content: { type: "text", text } }],
      };
    },
    (e) => {
      warn("Prompt rejected", { name, type: e.type, message: e.message });
      if (e.type === "invalid_arguments") {
        throw new McpError(ErrorCode.InvalidParams, `${e.message}: ${e.issues.join("; ")}`);
      }
      throw new McpError(ErrorCode.InternalError, e.message);
    },
  );
}

/**
 * Registers the instruction prompts on the MCP server
 */
export function registerPrompts(server: McpServer, prompts: PromptService): void {
  server.prompt(
    "analyze_job_market",
    "Analyze the job market for a role: common titles, skills, salaries and work arrangements",
    analyzeJobMarketArgs,
    (args) => toPromptResult("analyze_job_market", prompts.analyzeJobMarket(args)),
  );

  server.prompt(
    "save_jobs",
    "Instructions for saving job search results to a JSON file",
    saveJobsArgs,
    (args) => toPromptResult("save_jobs", prompts.saveJobs(args)),
  );

  server.prompt(
    "mesh_resumes",
    "Merge several resumes of one person into a single Markdown resume",
    meshResumesArgs,
    async (args) => toPromptResult("mesh_resumes", await prompts.meshResumes(args)),
  );

  server.prompt(
    "generate_resume",
    "Write a resume tailored to a job description from the resume mesh",
    tailoredDocumentArgs,
    (args) => toPromptResult("generate_resume", prompts.generateResume(args)),
  );

  server.prompt(
    "generate_cover_letter",
    "Write a cover letter tailored to a job description",
    tailoredDocumentArgs,
    (args) => toPromptResult("generate_cover_letter", prompts.generateCoverLetter(args)),
  );
}
