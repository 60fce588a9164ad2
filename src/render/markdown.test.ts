/**
 * Tests for markdown rendering.
 *
 * Run: node --import tsx --test src/render/markdown.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { resolveLanguage } from "./highlight.js";
import { renderMarkdown, resolveLink, slugify } from "./markdown.js";

describe("resolveLink", () => {
  it("leaves external links alone", () => {
    assert.equal(resolveLink("https://example.test/a.md"), "https://example.test/a.md");
    assert.equal(resolveLink("mailto:someone@example.test"), "mailto:someone@example.test");
  });

  it("leaves anchors alone", () => {
    assert.equal(resolveLink("#setup"), "#setup");
  });

  it("points markdown links at the flat html output", () => {
    assert.equal(resolveLink("./about.md"), "about.html");
    assert.equal(resolveLink("../posts/hello.md#intro"), "hello.html#intro");
  });

  it("leaves other relative links alone", () => {
    assert.equal(resolveLink("assets/logo.png"), "assets/logo.png");
  });
});

describe("resolveLanguage", () => {
  it("follows aliases regardless of case", () => {
    assert.equal(resolveLanguage("TS"), "typescript");
    assert.equal(resolveLanguage("yml"), "yaml");
  });

  it("falls back to plaintext", () => {
    assert.equal(resolveLanguage("cobol"), "plaintext");
    assert.equal(resolveLanguage(""), "plaintext");
  });
});

describe("slugify", () => {
  it("lower-cases and hyphenates", () => {
    assert.equal(slugify("Getting Started, Again!"), "getting-started-again");
  });
});

describe("renderMarkdown", () => {
  it("renders paragraphs", async () => {
    assert.equal(await renderMarkdown("Hello *world*."), "<p>Hello <em>world</em>.</p>\n");
  });

  it("anchors headings below h1", async () => {
    assert.equal(
      await renderMarkdown("# Title\n\n## Next Steps"),
      '<h1>Title</h1>\n<h2 id="next-steps"><a class="anchor" href="#next-steps">Next Steps</a></h2>\n'
    );
  });

  it("rewrites markdown links", async () => {
    assert.equal(
      await renderMarkdown("See [the intro](../posts/intro.md)."),
      '<p>See <a href="intro.html">the intro</a>.</p>\n'
    );
  });
});
