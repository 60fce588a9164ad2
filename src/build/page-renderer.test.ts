/**
 * Tests for layout lookup and page rendering.
 *
 * Run: node --import tsx --test src/build/page-renderer.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { constructFile } from "../content/types.js";
import { IOError, LayoutNotFoundError, RenderError } from "../errors.js";
import { renderTemplate } from "../render/template.js";
import { makePage, makeSite } from "../test-utils/fixtures.js";
import { createMemoryFileSystem } from "../test-utils/memory-fs.js";
import { findLayout, renderPage } from "./page-renderer.js";

describe("findLayout", () => {
  const layouts = [
    "/theme/layouts/index.html",
    "/theme/layouts/post.html.mustache",
  ].map(constructFile);

  it("matches on the file name up to the first dot", () => {
    assert.equal(findLayout(layouts, "post")?.basename, "post.html.mustache");
    assert.equal(findLayout(layouts, "index")?.basename, "index.html");
  });

  it("does not match on a longer prefix", () => {
    assert.equal(findLayout(layouts, "post.html"), undefined);
  });

  it("returns undefined for a missing layout", () => {
    assert.equal(findLayout(layouts, "missing"), undefined);
  });
});

describe("renderPage", () => {
  const layoutPath = "/theme/layouts/post.mustache";
  const post = makePage(
    "/site/posts/hello-world.md",
    { title: "Hello", layout: "post", date: new Date("2021-06-01") },
    "<p>Hi there</p>"
  );

  it("renders the layout with the page context", async () => {
    const fs = createMemoryFileSystem({
      [layoutPath]: "<h1>{{page.frontmatter.title}}</h1>{{{page.content}}} | {{config.title}}",
    });
    const site = makeSite({ posts: [post], layouts: [layoutPath] });

    const outcome = await renderPage(site, post, { fs, renderTemplate });

    assert.deepEqual(outcome, {
      ok: true,
      value: {
        path: "/out/hello-world.html",
        basename: "hello-world.html",
        stripped: "hello-world",
        content: "<h1>Hello</h1><p>Hi there</p> | Test Site",
      },
    });
  });

  it("does not write anything", async () => {
    const fs = createMemoryFileSystem({ [layoutPath]: "x" });
    const site = makeSite({ posts: [post], layouts: [layoutPath] });

    await renderPage(site, post, { fs, renderTemplate });

    assert.deepEqual([...fs.files.keys()], [layoutPath]);
  });

  it("fails with LayoutNotFoundError naming the layout", async () => {
    const page = makePage("/site/pages/about.md", { layout: "missing" });
    const site = makeSite({
      pages: [page],
      layouts: ["/theme/layouts/post.html", "/theme/layouts/index.html"],
    });

    const outcome = await renderPage(site, page, {
      fs: createMemoryFileSystem(),
      renderTemplate,
    });

    assert.ok(!outcome.ok);
    assert.ok(outcome.error instanceof LayoutNotFoundError);
    assert.equal(outcome.error.layout, "missing");
    assert.equal(outcome.error.message, "Layout missing does not exist");
  });

  it("fails with IOError when the layout cannot be read", async () => {
    const site = makeSite({ posts: [post], layouts: [layoutPath] });

    const outcome = await renderPage(site, post, {
      fs: createMemoryFileSystem(),
      renderTemplate,
    });

    assert.ok(!outcome.ok);
    assert.ok(outcome.error instanceof IOError);
    assert.equal(outcome.error.path, layoutPath);
    assert.equal(
      outcome.error.message,
      "Could not read /theme/layouts/post.mustache (ENOENT)"
    );
  });

  it("fails with RenderError naming the layout when the template is broken", async () => {
    const fs = createMemoryFileSystem({ [layoutPath]: "{{#posts}}never closed" });
    const site = makeSite({ posts: [post], layouts: [layoutPath] });

    const outcome = await renderPage(site, post, { fs, renderTemplate });

    assert.ok(!outcome.ok);
    assert.ok(outcome.error instanceof RenderError);
    assert.ok(outcome.error.message.startsWith("Layout post.mustache: "));
  });
});
