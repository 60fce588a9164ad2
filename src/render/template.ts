import Mustache from "mustache";
import { RenderError } from "../errors.js";

/**
 * Turns layout source plus a context into output text.
 */
export type TemplateRenderer = (template: string, context: object) => string;

/**
 * Render a mustache layout. Unknown keys render as empty strings, so the only
 * failure is a template mustache cannot parse (e.g. an unclosed section).
 */
export function renderTemplate(template: string, context: object): string {
  try {
    return Mustache.render(template, context);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RenderError(`Could not render template: ${reason}`, {
      cause: err,
    });
  }
}
