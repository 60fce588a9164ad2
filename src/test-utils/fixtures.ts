/**
 * Site model builders for tests.
 */

import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  constructFile,
  type Frontmatter,
  type Page,
  type Site,
  type SiteConfig,
} from "../content/types.js";

export function makeTempDir(prefix = "inkwell-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function makePage(
  path: string,
  frontmatter: Partial<Frontmatter> = {},
  content = ""
): Page {
  const file = constructFile(path);
  return {
    file,
    frontmatter: {
      layout: "page",
      title: file.stripped,
      permalink: `${file.stripped}.html`,
      ...frontmatter,
    },
    body: content,
    content,
  };
}

export function makeConfig(overrides: Partial<SiteConfig> = {}): SiteConfig {
  return {
    title: "Test Site",
    description: "A site for tests",
    url: "https://example.test",
    outDir: "/out",
    generateRss: false,
    themeDir: "/theme",
    extra: {},
    ...overrides,
  };
}

export interface SiteFixture {
  config?: Partial<SiteConfig>;
  pages?: Page[];
  posts?: Page[];
  layouts?: string[];
  assets?: string[];
}

export function makeSite(fixture: SiteFixture = {}): Site {
  return {
    config: makeConfig(fixture.config),
    theme: {
      layouts: (fixture.layouts ?? []).map(constructFile),
      assets: (fixture.assets ?? []).map(constructFile),
    },
    pages: fixture.pages ?? [],
    posts: fixture.posts ?? [],
  };
}
