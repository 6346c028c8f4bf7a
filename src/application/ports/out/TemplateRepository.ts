import type { Result } from "neverthrow";

export type TemplateError = { type: "template_not_found"; name: string; message: string };

/**
 * Output port for prompt template text
 */
export interface TemplateRepository {
  load(name: string): Result<string, TemplateError>;
}
