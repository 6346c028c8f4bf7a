import { expect, test } from "vitest";
import {
  PromptService,
  renderTemplate,
  toFilenamePart,
  toFilenameSlug,
} from "../../../src/application/services/PromptService.ts";
import { InMemoryTemplateRepository, StaticConfigProvider } from "../../helpers/fakes.ts";

const templates = new InMemoryTemplateRepository({
  analyze_job_market: "{{role}}|{{city}}|{{country}}|{{platform}}|{{num_jobs}}",
  save_jobs: "{{jobs_dir}}/{{filename}}",
  mesh_resumes: "{{save_directory}}/{{filename}}",
  generate_resume: "{{save_directory}}/{{filename}}",
  generate_cover_letter: "{{save_directory}}/{{filename}}\n{{job_description}}",
});

const fixedNow = () => new Date(2025, 0, 15, 10, 30);

function createService(env?: Record<string, string>): PromptService {
  return new PromptService(templates, new StaticConfigProvider(env), fixedNow);
}

test("toFilenamePart keeps letters, digits, dashes and underscores", () => {
  expect(toFilenamePart(" Senior C++ / Data Engineer ")).toBe("Senior_C__Data_Engineer");
  expect(toFilenamePart("São Paulo")).toBe("São_Paulo");
});

test("toFilenameSlug lowercases and collapses separators", () => {
  expect(toFilenameSlug("ACME, Inc.")).toBe("acme_inc");
  expect(toFilenameSlug("__Data  Engineer__")).toBe("data_engineer");
});

test("renderTemplate fills placeholders once and blanks unknown ones", () => {
  expect(renderTemplate("{{a}}-{{b}}", { a: "{{b}}" })).toBe("{{b}}-");
});

test("analyzeJobMarket fills defaults for missing criteria", () => {
  const text = createService().analyzeJobMarket({ role: "chef" })._unsafeUnwrap();
  expect(text).toBe("chef|any|any|any|5");
});

test("analyzeJobMarket validates the platform and job count", () => {
  const service = createService();

  expect(service.analyzeJobMarket({ role: "chef", platform: "Indeed", num_jobs: "20" })._unsafeUnwrap())
    .toBe("chef|any|any|indeed|20");
  expect(service.analyzeJobMarket({ role: "chef", num_jobs: "21" })._unsafeUnwrapErr().type)
    .toBe("invalid_arguments");
  expect(service.analyzeJobMarket({ role: "chef", platform: "monster" })._unsafeUnwrapErr().type)
    .toBe("invalid_arguments");
  expect(service.analyzeJobMarket({ role: " " })._unsafeUnwrapErr().type).toBe("invalid_arguments");
});

test("saveJobs builds the file name from the search criteria", () => {
  const service = createService();

  expect(service.saveJobs({
    jobs_dir: "/tmp/jobs",
    date: "2025-01-15",
    role: "Data Engineer",
    city: "New York",
    country: "USA",
    num_jobs: "10",
  })._unsafeUnwrap()).toBe("/tmp/jobs/2025-01-15_Data_Engineer_New_York_USA_10.json");

  expect(service.saveJobs({ jobs_dir: "/tmp/jobs", date: "2025-01-15", role: "Chef" })._unsafeUnwrap())
    .toBe("/tmp/jobs/2025-01-15_Chef_5.json");
});

test("saveJobs accepts up to 100 jobs", () => {
  const service = createService();
  const args = { jobs_dir: "/tmp/jobs", date: "2025-01-15", role: "Chef" };

  expect(service.saveJobs({ ...args, num_jobs: "100" }).isOk()).toBe(true);
  expect(service.saveJobs({ ...args, num_jobs: "101" }).isErr()).toBe(true);
  expect(service.saveJobs({ ...args, num_jobs: "ten" }).isErr()).toBe(true);
});

test("meshResumes uses the configured file name when none is given", async () => {
  const text = await createService({ RESUME_MESH_FILENAME: "my_mesh" })
    .meshResumes({ save_directory: "/tmp/resumes", date: "2025-01-15" });
  expect(text._unsafeUnwrap()).toBe("/tmp/resumes/my_mesh_2025-01-15.md");
});

test("meshResumes prefers an explicit file name and rejects malformed ones", async () => {
  const service = createService();

  expect((await service.meshResumes({
    save_directory: "/tmp/resumes",
    date: "2025-01-15",
    resume_mesh_filename: "combined",
  }))._unsafeUnwrap()).toBe("/tmp/resumes/combined_2025-01-15.md");

  expect((await service.meshResumes({
    save_directory: "/tmp/resumes",
    date: "2025-01-15",
    resume_mesh_filename: "../escape",
  }))._unsafeUnwrapErr().type).toBe("invalid_arguments");
});

test("generateResume and generateCoverLetter name files by date, company and role", () => {
  const service = createService();
  const args = {
    save_directory: "/tmp/out",
    role: "Senior Data Engineer",
    company: "ACME, Inc.",
    job_description: "Build pipelines.",
  };

  expect(service.generateResume(args)._unsafeUnwrap())
    .toBe("/tmp/out/2025-01-15_acme_inc_senior_data_engineer_resume.md");
  expect(service.generateCoverLetter(args)._unsafeUnwrap())
    .toBe("/tmp/out/2025-01-15_acme_inc_senior_data_engineer_cover_letter.md\nBuild pipelines.");
  expect(service.generateResume({ ...args, job_description: "" })._unsafeUnwrapErr().type)
    .toBe("invalid_arguments");
});

test("PromptService reports a missing template", () => {
  const service = new PromptService(new InMemoryTemplateRepository({}), new StaticConfigProvider(), fixedNow);
  expect(service.analyzeJobMarket({ role: "chef" })._unsafeUnwrapErr()).toEqual({
    type: "template_not_found",
    name: "analyze_job_market",
    message: "Prompt template \"analyze_job_market\" could not be read",
  });
});
