import { basename, extname } from "node:path";

export interface SiteFile {
  /** Absolute path */
  path: string;
  /** File name with extensions (e.g., post.html.mustache) */
  basename: string;
  /** File name without its last extension (e.g., post.html) */
  stripped: string;
}

export interface RenderedFile extends SiteFile {
  content: string;
}

export function constructFile(path: string): SiteFile {
  const base = basename(path);
  return {
    path,
    basename: base,
    stripped: base.slice(0, base.length - extname(base).length),
  };
}

export function constructRenderedFile(
  path: string,
  content: string
): RenderedFile {
  return { ...constructFile(path), content };
}

export interface Frontmatter {
  layout: string;
  title: string;
  date?: Date;
  permalink: string;
  [key: string]: unknown;
}

export interface Page {
  file: SiteFile;
  frontmatter: Frontmatter;
  /** Markdown body without frontmatter */
  body: string;
  /** Body rendered to HTML */
  content: string;
}

export interface SiteConfig {
  title: string;
  description: string;
  url: string;
  author?: string;
  /** Absolute output directory */
  outDir: string;
  generateRss: boolean;
  /** Absolute theme directory */
  themeDir: string;
  /** Keys from site.json this tool does not know, passed to templates as-is */
  extra: Record<string, unknown>;
}

export interface Theme {
  layouts: SiteFile[];
  assets: SiteFile[];
}

export interface Site {
  config: SiteConfig;
  theme: Theme;
  pages: Page[];
  posts: Page[];
}

/**
 * Newest first. Equal dates keep their input order, undated pages go last.
 */
export function compareByDateDescending(a: Page, b: Page): number {
  const aTime = a.frontmatter.date?.getTime();
  const bTime = b.frontmatter.date?.getTime();

  if (aTime === undefined || bTime === undefined) {
    if (aTime === bTime) return 0;
    return aTime === undefined ? 1 : -1;
  }

  return bTime - aTime;
}

// ---------------------------------------------------------------------------
// Template context views
// ---------------------------------------------------------------------------

export type ContextRecord = Record<string, unknown>;

/**
 * Format a date the way templates see it: YYYY-MM-DD (UTC).
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function fileToContext(file: SiteFile): ContextRecord {
  return {
    path: file.path,
    basename: file.basename,
    stripped: file.stripped,
  };
}

export function frontmatterToContext(frontmatter: Frontmatter): ContextRecord {
  const { date, ...rest } = frontmatter;
  return date ? { ...rest, date: formatDate(date) } : rest;
}

export function pageToContext(page: Page): ContextRecord {
  return {
    file: fileToContext(page.file),
    frontmatter: frontmatterToContext(page.frontmatter),
    body: page.body,
    content: page.content,
  };
}

export function configToContext(config: SiteConfig): ContextRecord {
  const { extra, ...known } = config;
  return { ...extra, ...known };
}

export function themeToContext(theme: Theme): ContextRecord {
  return {
    layouts: theme.layouts.map(fileToContext),
    assets: theme.assets.map(fileToContext),
  };
}
