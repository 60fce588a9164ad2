/**
 * Site build pipeline.
 *
 *   prepare -> render -> write -> copy assets -> feed
 *
 * Phases run strictly one after another and the first failing phase ends the
 * build. Within the render, write and copy phases every item runs
 * concurrently and all of them finish before the phase's outcomes are
 * collected, so a failing phase reports every failing item at once.
 * Nothing is rolled back: files written before a later failure stay on disk.
 */

import { join } from "node:path";
import { constructSite } from "../content/filesystem.js";
import type { Page, RenderedFile, Site, SiteConfig } from "../content/types.js";
import { BuildError, errorCode, RenderError, toBuildError } from "../errors.js";
import { plainFormatter, type Formatter } from "../format/colors.js";
import { silentLogger, type Logger } from "../logger.js";
import { renderFeed, type FeedRenderer } from "../render/feed.js";
import { renderTemplate, type TemplateRenderer } from "../render/template.js";
import { nodeFileSystem, type BuildFileSystem } from "./filesystem.js";
import {
  collectOutcomes,
  failure,
  nothing,
  success,
  type Outcome,
} from "./outcome.js";
import { outputPath, renderPage } from "./page-renderer.js";
import { concurrencyError, parallelMap } from "./parallel.js";

export const FEED_FILENAME = "rss.xml";

export interface BuildOptions {
  fs?: BuildFileSystem;
  logger?: Logger;
  formatter?: Formatter;
  /** Worker-pool size for each parallel phase, 0 = unbounded */
  concurrency?: number;
  renderTemplate?: TemplateRenderer;
  renderFeed?: FeedRenderer;
  /** Builds the site model for buildProject */
  construct?: (path: string) => Promise<Site>;
}

interface BuildDeps {
  fs: BuildFileSystem;
  logger: Logger;
  formatter: Formatter;
  concurrency: number;
  renderTemplate: TemplateRenderer;
  renderFeed: FeedRenderer;
}

export interface BuildSummary {
  outDir: string;
  /** Written page paths, in render order */
  pages: string[];
  /** Copied asset destinations, in theme order */
  assets: string[];
  /** Feed path, or null when no feed was generated */
  feed: string | null;
}

function resolveDeps(options: BuildOptions): BuildDeps {
  return {
    fs: options.fs ?? nodeFileSystem,
    logger: options.logger ?? silentLogger,
    formatter: options.formatter ?? plainFormatter,
    concurrency: options.concurrency ?? 0,
    renderTemplate: options.renderTemplate ?? renderTemplate,
    renderFeed: options.renderFeed ?? renderFeed,
  };
}

export function assetPath(config: SiteConfig, filename?: string): string {
  return filename === undefined
    ? join(config.outDir, "assets")
    : join(config.outDir, "assets", filename);
}

// ---------------------------------------------------------------------------
// Phases
// ---------------------------------------------------------------------------

/**
 * Create <outDir>/assets and any missing parents. Safe to repeat.
 */
export async function prepareDirectories(
  site: Site,
  options: BuildOptions = {}
): Promise<Outcome<void>> {
  const { fs } = resolveDeps(options);

  try {
    await fs.mkdirp(assetPath(site.config));
    return nothing();
  } catch (err) {
    if (errorCode(err) === "EEXIST") {
      return nothing();
    }
    return failure(toBuildError(err));
  }
}

/**
 * One failure per page whose output path an earlier page already claimed.
 */
function outputClashes(site: Site, pages: readonly Page[]): Outcome<void>[] {
  const claimed = new Map<string, Page>();

  return pages.flatMap((page) => {
    const path = outputPath(site, page);
    const owner = claimed.get(path);
    if (!owner) {
      claimed.set(path, page);
      return [];
    }
    return [
      failure(
        new RenderError(
          `${owner.file.path} and ${page.file.path} both render to ${path}`
        )
      ),
    ];
  });
}

/**
 * Render pages then posts through their layouts. Nothing is written.
 * Fails without rendering when two pages would write the same file.
 */
export async function renderPages(
  site: Site,
  options: BuildOptions = {}
): Promise<Outcome<RenderedFile[]>> {
  const deps = resolveDeps(options);
  const { logger, formatter } = deps;
  const pages = [...site.pages, ...site.posts];

  const clashes = collectOutcomes(outputClashes(site, pages));
  if (!clashes.ok) return clashes;

  const outcomes = await parallelMap(
    pages,
    (page) => {
      logger.info(`Rendering page ${formatter.highlight(page.file.stripped)}...`);
      return renderPage(site, page, deps);
    },
    { concurrency: deps.concurrency }
  );

  return collectOutcomes(outcomes);
}

export async function writeFiles(
  files: readonly RenderedFile[],
  options: BuildOptions = {}
): Promise<Outcome<string[]>> {
  const { fs, logger, formatter, concurrency } = resolveDeps(options);

  const outcomes = await parallelMap(
    files,
    async (file): Promise<Outcome<string>> => {
      logger.info(`Writing ${formatter.highlight(file.path)}...`);
      await fs.writeFile(file.path, file.content);
      return success(file.path);
    },
    { concurrency }
  );

  return collectOutcomes(outcomes);
}

/**
 * Copy every theme asset to <outDir>/assets/<basename>.
 */
export async function copyAssets(
  site: Site,
  options: BuildOptions = {}
): Promise<Outcome<string[]>> {
  const { fs, logger, formatter, concurrency } = resolveDeps(options);

  const outcomes = await parallelMap(
    site.theme.assets,
    async (file): Promise<Outcome<string>> => {
      const destination = assetPath(site.config, file.basename);
      logger.info(`Copying ${formatter.highlight(file.path)}...`);
      await fs.copyFile(file.path, destination);
      return success(destination);
    },
    { concurrency }
  );

  return collectOutcomes(outcomes);
}

/**
 * Write <outDir>/rss.xml when the site asks for a feed and has posts.
 * Resolves to the feed path, or to nothing when skipped.
 */
export async function handleFeed(
  site: Site,
  options: BuildOptions = {}
): Promise<Outcome<string>> {
  if (!site.config.generateRss || site.posts.length === 0) {
    return nothing();
  }

  const { fs, logger, formatter, renderFeed } = resolveDeps(options);
  const path = join(site.config.outDir, FEED_FILENAME);

  try {
    const feed = renderFeed(site);
    logger.info(`Writing ${formatter.highlight(path)}...`);
    await fs.writeFile(path, feed);
    return success(path);
  } catch (err) {
    return failure(toBuildError(err));
  }
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export async function buildSite(
  site: Site,
  options: BuildOptions = {}
): Promise<Outcome<BuildSummary>> {
  const { logger, concurrency } = resolveDeps(options);

  const invalid = concurrencyError(concurrency);
  if (invalid) {
    return failure(new BuildError(invalid.message, { cause: invalid }));
  }

  const prepared = await prepareDirectories(site, options);
  if (!prepared.ok) return prepared;

  const rendered = await renderPages(site, options);
  if (!rendered.ok) return rendered;
  logger.debug("Rendered pages", { count: rendered.value?.length ?? 0 });

  const written = await writeFiles(rendered.value ?? [], options);
  if (!written.ok) return written;

  const copied = await copyAssets(site, options);
  if (!copied.ok) return copied;
  logger.debug("Copied assets", { count: copied.value?.length ?? 0 });

  const feed = await handleFeed(site, options);
  if (!feed.ok) return feed;

  return success({
    outDir: site.config.outDir,
    pages: written.value ?? [],
    assets: copied.value ?? [],
    feed: feed.value ?? null,
  });
}

/**
 * Construct the site at `path` and build it.
 */
export async function buildProject(
  path: string,
  options: BuildOptions = {}
): Promise<Outcome<BuildSummary>> {
  const construct = options.construct ?? constructSite;

  let site: Site;
  try {
    site = await construct(path);
  } catch (err) {
    return failure(toBuildError(err));
  }

  return buildSite(site, options);
}
