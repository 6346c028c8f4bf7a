import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { fromThrowable, ok, Result } from "neverthrow";
import type { TemplateError, TemplateRepository } from "../../../application/ports/out/TemplateRepository.ts";
import { debug } from "../../../config/logger.ts";

const DEFAULT_TEMPLATE_DIR = new URL("../../../prompts/templates/", import.meta.url);

/**
 * Loads Markdown prompt templates from disk, once per name
 */
export class FileTemplateRepository implements TemplateRepository {
  private readonly cache = new Map<string, string>();

  constructor(private readonly directory: URL = DEFAULT_TEMPLATE_DIR) {}

  load(name: string): Result<string, TemplateError> {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return ok(cached);
    }

    const path = fileURLToPath(new URL(`${name}.md`, this.directory));
    const read = fromThrowable(
      () => readFileSync(path, "utf8"),
      (): TemplateError => ({
        type: "template_not_found",
        name,
        message: `Prompt template "${name}" could not be read`,
      }),
    );

    return read().map((text) => {
      debug("Prompt template loaded", { name });
      this.cache.set(name, text);
      return text;
    });
  }
}
