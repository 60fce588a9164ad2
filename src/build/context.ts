import {
  compareByDateDescending,
  configToContext,
  frontmatterToContext,
  pageToContext,
  themeToContext,
  type ContextRecord,
  type Page,
  type Site,
} from "../content/types.js";
import { deepFreeze } from "../utils/freeze.js";

/**
 * Everything a layout can see while rendering one page.
 */
export interface RenderContext {
  readonly page: ContextRecord;
  readonly pages: readonly ContextRecord[];
  readonly posts: readonly ContextRecord[];
  readonly config: ContextRecord;
  readonly theme: ContextRecord;
}

/**
 * Frontmatter views of a collection, sorted by date.
 * Used for pages as well as posts.
 */
export function normalized(pages: readonly Page[]): ContextRecord[] {
  return [...pages]
    .sort(compareByDateDescending)
    .map((page) => frontmatterToContext(page.frontmatter));
}

/**
 * The context is a frozen copy; the site and page passed in are left as they are.
 */
export function buildRenderContext(site: Site, page: Page): RenderContext {
  const context: RenderContext = structuredClone({
    page: pageToContext(page),
    pages: normalized(site.pages),
    posts: normalized(site.posts),
    config: configToContext(site.config),
    theme: themeToContext(site.theme),
  });
  return deepFreeze(context);
}
