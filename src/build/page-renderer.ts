import { join } from "node:path";
import {
  constructRenderedFile,
  type Page,
  type RenderedFile,
  type Site,
  type SiteFile,
} from "../content/types.js";
import { LayoutNotFoundError, RenderError, toBuildError } from "../errors.js";
import type { TemplateRenderer } from "../render/template.js";
import { buildRenderContext } from "./context.js";
import type { BuildFileSystem } from "./filesystem.js";
import { failure, success, type Outcome } from "./outcome.js";

export interface PageRendererDeps {
  fs: BuildFileSystem;
  renderTemplate: TemplateRenderer;
}

/**
 * Find the layout whose file name, up to the first dot, equals `name`.
 * `post.html.mustache` answers to `post`.
 */
export function findLayout(
  layouts: readonly SiteFile[],
  name: string
): SiteFile | undefined {
  return layouts.find((file) => file.basename.split(".")[0] === name);
}

export function outputPath(site: Site, page: Page): string {
  return join(site.config.outDir, `${page.file.stripped}.html`);
}

/**
 * Render one page through its layout. Reads the layout file and nothing else;
 * writing the result is left to the caller.
 */
export async function renderPage(
  site: Site,
  page: Page,
  deps: PageRendererDeps
): Promise<Outcome<RenderedFile>> {
  const layout = findLayout(site.theme.layouts, page.frontmatter.layout);
  if (!layout) {
    return failure(new LayoutNotFoundError(page.frontmatter.layout));
  }

  let template: string;
  try {
    template = await deps.fs.readFile(layout.path);
  } catch (err) {
    return failure(toBuildError(err));
  }

  const context = buildRenderContext(site, page);

  try {
    const output = deps.renderTemplate(template, context);
    return success(constructRenderedFile(outputPath(site, page), output));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return failure(
      new RenderError(`Layout ${layout.basename}: ${reason}`, {
        cause: err,
      })
    );
  }
}
