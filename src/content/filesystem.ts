import matter from "gray-matter";
import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { z } from "zod";
import { errorCode, IOError, PathNotFoundError, RenderError } from "../errors.js";
import { renderMarkdown } from "../render/markdown.js";
import { deepFreeze } from "../utils/freeze.js";
import {
  constructFile,
  type Frontmatter,
  type Page,
  type Site,
  type SiteConfig,
  type SiteFile,
  type Theme,
} from "./types.js";

export const CONFIG_FILENAME = "site.json";

/**
 * Known acronyms that contain vowels (consonant-only ones are auto-detected)
 */
const VOWEL_ACRONYMS = new Set([
  "ai", "api", "ui", "ux", "uri", "url", "io", "os",
  "faq", "rss", "seo", "cms", "css", "html", "json", "xml",
  "yaml", "toml", "http", "https", "ip", "dns", "ssl", "tls",
]);

function isAcronym(word: string): boolean {
  const lower = word.toLowerCase();

  if (VOWEL_ACRONYMS.has(lower)) return true;

  // 2-3 letter words with no vowels are likely acronyms
  return lower.length >= 2 && lower.length <= 3 && !/[aeiouy]/.test(lower);
}

/**
 * Humanize a filename into a display name
 * e.g., "getting-started" -> "Getting Started"
 * e.g., "rss-faq" -> "RSS FAQ"
 */
export function humanize(filename: string): string {
  return filename
    .replace(/[-_]/g, " ")
    .replace(/\b\w/g, (c) => c.toUpperCase())
    .replace(/\b\w+\b/g, (word) => (isAcronym(word) ? word.toUpperCase() : word));
}

// ---------------------------------------------------------------------------
// site.json
// ---------------------------------------------------------------------------

const siteConfigSchema = z
  .object({
    title: z.string().min(1).optional(),
    description: z.string().default(""),
    url: z.string().default(""),
    author: z.string().optional(),
    outDir: z.string().min(1).default("build"),
    generateRss: z.boolean().default(false),
    theme: z.string().min(1).default("theme"),
  })
  .passthrough();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseSiteConfig(raw: unknown, projectPath: string): SiteConfig {
  const result = siteConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new RenderError(
      `Invalid ${CONFIG_FILENAME}: ${formatIssues(result.error)}`
    );
  }

  const { title, description, url, author, outDir, generateRss, theme, ...extra } =
    result.data;

  return {
    title: title ?? humanize(basename(projectPath)),
    description,
    url,
    ...(author !== undefined ? { author } : {}),
    outDir: resolve(projectPath, outDir),
    generateRss,
    themeDir: resolve(projectPath, theme),
    extra,
  };
}

async function loadSiteConfig(projectPath: string): Promise<SiteConfig> {
  const configPath = join(projectPath, CONFIG_FILENAME);

  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return parseSiteConfig({}, projectPath);
    }
    throw new IOError("read", configPath, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new RenderError(`Invalid JSON in ${configPath}: ${e}`, { cause: e });
  }

  return parseSiteConfig(parsed, projectPath);
}

// ---------------------------------------------------------------------------
// Directory scanning
// ---------------------------------------------------------------------------

/**
 * Regular files directly inside `dirPath`, hidden files skipped, sorted by
 * name. A missing directory has no files.
 */
async function listFiles(
  dirPath: string,
  filter: (name: string) => boolean = () => true
): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return [];
    }
    throw new IOError("read", dirPath, err);
  }

  return entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .filter(filter)
    .sort()
    .map((name) => join(dirPath, name));
}

const isMarkdown = (name: string) => extname(name).toLowerCase() === ".md";

function parseDate(value: unknown, file: SiteFile): Date | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }

  const date =
    value instanceof Date
      ? value
      : typeof value === "string" || typeof value === "number"
        ? new Date(value)
        : undefined;

  if (!date || Number.isNaN(date.getTime())) {
    throw new RenderError(`Invalid date in ${file.path}: ${String(value)}`);
  }
  return date;
}

function stringField(value: unknown, fallback: string): string {
  return typeof value === "string" && value !== "" ? value : fallback;
}

/**
 * Read one markdown file into a Page. `defaultLayout` applies when the
 * frontmatter names none.
 */
export async function loadPage(
  filePath: string,
  defaultLayout: string
): Promise<Page> {
  const file = constructFile(filePath);

  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new IOError("read", filePath, err);
  }

  let data: Record<string, unknown>;
  let body: string;
  try {
    ({ data, content: body } = matter(raw));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RenderError(`Invalid frontmatter in ${filePath}: ${reason}`, {
      cause: err,
    });
  }

  const { layout, title, date, permalink, ...rest } = data;
  const parsedDate = parseDate(date, file);
  const frontmatter: Frontmatter = {
    ...rest,
    layout: stringField(layout, defaultLayout),
    title: stringField(title, humanize(file.stripped)),
    permalink: stringField(permalink, `${file.stripped}.html`),
    ...(parsedDate ? { date: parsedDate } : {}),
  };

  return {
    file,
    frontmatter,
    body,
    content: await renderMarkdown(body),
  };
}

async function loadTheme(themeDir: string): Promise<Theme> {
  const [layouts, assets] = await Promise.all([
    listFiles(join(themeDir, "layouts")),
    listFiles(join(themeDir, "assets")),
  ]);

  return {
    layouts: layouts.map(constructFile),
    assets: assets.map(constructFile),
  };
}

/**
 * Build the site model for a project directory:
 *
 *   site.json            optional configuration
 *   pages/*.md           pages (default layout "page")
 *   posts/*.md           posts (default layout "post")
 *   theme/layouts/*      mustache layouts
 *   theme/assets/*       files copied to <outDir>/assets
 */
export async function constructSite(path: string): Promise<Site> {
  const projectPath = resolve(path);

  const stats = await stat(projectPath).catch((err: unknown) => {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new PathNotFoundError(projectPath);
    }
    throw new IOError("read", projectPath, err);
  });
  if (!stats.isDirectory()) {
    throw new PathNotFoundError(projectPath);
  }

  const config = await loadSiteConfig(projectPath);

  const [pageFiles, postFiles, theme] = await Promise.all([
    listFiles(join(projectPath, "pages"), isMarkdown),
    listFiles(join(projectPath, "posts"), isMarkdown),
    loadTheme(config.themeDir),
  ]);

  const pages = await Promise.all(pageFiles.map((f) => loadPage(f, "page")));
  const posts = await Promise.all(postFiles.map((f) => loadPage(f, "post")));

  return deepFreeze({ config, theme, pages, posts });
}
