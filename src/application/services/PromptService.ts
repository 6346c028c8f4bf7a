import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import { SUPPORTED_PLATFORMS } from "../../domain/models/jobs.ts";
import type { ConfigProvider } from "../ports/out/ConfigProvider.ts";
import type { TemplateError, TemplateRepository } from "../ports/out/TemplateRepository.ts";

export type PromptError =
  | { type: "invalid_arguments"; message: string; issues: ReadonlyArray<string> }
  | TemplateError;

export interface AnalyzeJobMarketArgs {
  role: string;
  city?: string;
  country?: string;
  platform?: string;
  num_jobs?: string;
}

export interface SaveJobsArgs {
  jobs_dir: string;
  date: string;
  role: string;
  city?: string;
  country?: string;
  num_jobs?: string;
}

export interface MeshResumesArgs {
  save_directory: string;
  date: string;
  resume_mesh_filename?: string;
}

export interface TailoredDocumentArgs {
  save_directory: string;
  role: string;
  company: string;
  job_description: string;
}

const DEFAULT_PROMPT_JOBS = 5;

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const requiredText = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const jobCount = (max: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int("num_jobs must be an integer").min(1).max(max).default(DEFAULT_PROMPT_JOBS),
  );

const analyzeJobMarketSchema = z.object({
  role: requiredText("role"),
  city: optionalText,
  country: optionalText,
  platform: z.preprocess(
    (value) => typeof value === "string" ? value.trim().toLowerCase() : value,
    z.enum([...SUPPORTED_PLATFORMS, ""]).optional(),
  ),
  num_jobs: jobCount(20),
});

const saveJobsSchema = z.object({
  jobs_dir: requiredText("jobs_dir"),
  date: requiredText("date"),
  role: requiredText("role"),
  city: optionalText,
  country: optionalText,
  num_jobs: jobCount(100),
});

const meshResumesSchema = z.object({
  save_directory: requiredText("save_directory"),
  date: requiredText("date"),
  resume_mesh_filename: z.preprocess(
    blankToUndefined,
    z.string().trim()
      .regex(/^[a-zA-Z0-9_-]+$/, "resume_mesh_filename may only contain letters, digits, - and _")
      .optional(),
  ),
});

const tailoredDocumentSchema = z.object({
  save_directory: requiredText("save_directory"),
  role: requiredText("role"),
  company: requiredText("company"),
  job_description: requiredText("job_description"),
});

function parseArgs<T extends z.ZodTypeAny>(
  schema: T,
  args: unknown,
): Result<z.output<T>, PromptError> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    return err({
      type: "invalid_arguments",
      message: "Invalid prompt arguments",
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return ok(parsed.data);
}

/**
 * Keeps letters, digits, spaces, "-" and "_", then turns spaces into "_"
 */
export function toFilenamePart(text: string): string {
  return Array.from(text)
    .filter((char) => /[\p{L}\p{N} _-]/u.test(char))
    .join("")
    .trim()
    .replace(/ /g, "_");
}

/**
 * Lowercase slug: anything outside [a-z0-9_-] becomes "_", runs of "_" collapse
 */
export function toFilenameSlug(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, "_")
    .split("_")
    .filter((part) => part.length > 0)
    .join("_");
}

export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_match, key: string) => values[key] ?? "");
}

function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Renders the instruction prompts shipped with the server.
 * The text is returned to the host, which runs it; nothing here writes files.
 */
export class PromptService {
  constructor(
    private readonly templates: TemplateRepository,
    private readonly configProvider: ConfigProvider,
    private readonly now: () => Date = () => new Date(),
  ) {}

  analyzeJobMarket(args: AnalyzeJobMarketArgs): Result<string, PromptError> {
    return parseArgs(analyzeJobMarketSchema, args).andThen((values) =>
      this.render("analyze_job_market", {
        role: values.role,
        city: values.city ?? "any",
        country: values.country ?? "any",
        platform: values.platform || "any",
        num_jobs: String(values.num_jobs),
      })
    );
  }

  saveJobs(args: SaveJobsArgs): Result<string, PromptError> {
    return parseArgs(saveJobsSchema, args).andThen((values) => {
      const parts = [values.date, toFilenamePart(values.role)];
      for (const optional of [values.city, values.country]) {
        const part = optional ? toFilenamePart(optional) : "";
        if (part) parts.push(part);
      }
      parts.push(String(values.num_jobs));

      return this.render("save_jobs", {
        jobs_dir: values.jobs_dir,
        date: values.date,
        role: values.role,
        city: values.city ?? "",
        country: values.country ?? "",
        num_jobs: String(values.num_jobs),
        filename: `${parts.join("_")}.json`,
      });
    });
  }

  async meshResumes(args: MeshResumesArgs): Promise<Result<string, PromptError>> {
    const parsed = parseArgs(meshResumesSchema, args);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    const values = parsed.value;
    let name = values.resume_mesh_filename;
    if (name === undefined) {
      const config = await this.configProvider.resolve();
      if (config.isErr()) {
        return err({
          type: "invalid_arguments",
          message: "resume_mesh_filename was not given and no default is configured",
          issues: [config.error.message],
        });
      }
      name = config.value.resumeMeshFilename;
    }

    return this.render("mesh_resumes", {
      save_directory: values.save_directory,
      filename: `${name}_${values.date}.md`,
    });
  }

  generateResume(args: TailoredDocumentArgs): Result<string, PromptError> {
    return this.tailoredDocument("generate_resume", "resume", args);
  }

  generateCoverLetter(args: TailoredDocumentArgs): Result<string, PromptError> {
    return this.tailoredDocument("generate_cover_letter", "cover_letter", args);
  }

  private tailoredDocument(
    template: string,
    suffix: string,
    args: TailoredDocumentArgs,
  ): Result<string, PromptError> {
    return parseArgs(tailoredDocumentSchema, args).andThen((values) => {
      const company = toFilenameSlug(values.company);
      const role = toFilenameSlug(values.role);
      return this.render(template, {
        save_directory: values.save_directory,
        role: values.role,
        company: values.company,
        job_description: values.job_description,
        filename: `${formatDate(this.now())}_${company}_${role}_${suffix}.md`,
      });
    });
  }

  private render(name: string, values: Readonly<Record<string, string>>): Result<string, PromptError> {
    return this.templates.load(name).map((template) => renderTemplate(template, values));
  }
}
