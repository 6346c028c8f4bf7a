import type { ConfigProvider } from "../application/ports/out/ConfigProvider.ts";
import type { JobSearchRepository } from "../application/ports/out/JobSearchRepository.ts";
import type { TemplateRepository } from "../application/ports/out/TemplateRepository.ts";
import type { HttpClientOptions } from "../adapters/out/http/HttpClient.ts";
import { JSearchAdapter } from "../adapters/out/jobs/JSearchAdapter.ts";
import { FileTemplateRepository } from "../adapters/out/templates/FileTemplateRepository.ts";
import { ConfigResolver, EnvSource } from "./env.ts";
import { debug } from "./logger.ts";

/**
 * Type definition representing the adapter container.
 */
export interface AdapterContainer {
  config: ConfigProvider;
  jobSearch: JobSearchRepository;
  templates: TemplateRepository;
}

export interface AdapterOptions {
  env?: EnvSource;
  http?: HttpClientOptions;
  templateDir?: URL;
}

/**
 * Creates the outbound adapters. Nothing here reads the environment yet;
 * configuration is resolved on first use.
 */
export function initializeAdapters(options: AdapterOptions = {}): AdapterContainer {
  const jobSearch = new JSearchAdapter(options.http);
  debug("Registered job search adapter", { id: jobSearch.getId() });

  return {
    config: new ConfigResolver(options.env),
    jobSearch,
    templates: new FileTemplateRepository(options.templateDir),
  };
}
