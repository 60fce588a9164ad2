/**
 * Tests for layout rendering.
 *
 * Run: node --import tsx --test src/render/template.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { RenderError } from "../errors.js";
import { renderTemplate } from "./template.js";

describe("renderTemplate", () => {
  it("substitutes nested values and escapes html", () => {
    assert.equal(
      renderTemplate("<b>{{page.title}}</b>", { page: { title: "Tom & Jerry" } }),
      "<b>Tom &amp; Jerry</b>"
    );
  });

  it("leaves triple mustaches unescaped", () => {
    assert.equal(renderTemplate("{{{html}}}", { html: "<p>x</p>" }), "<p>x</p>");
  });

  it("iterates over collections", () => {
    assert.equal(
      renderTemplate("{{#posts}}[{{title}}]{{/posts}}", {
        posts: [{ title: "b" }, { title: "a" }],
      }),
      "[b][a]"
    );
  });

  it("renders unknown keys as empty", () => {
    assert.equal(renderTemplate("a{{missing}}b", {}), "ab");
  });

  it("raises RenderError for a template it cannot parse", () => {
    assert.throws(
      () => renderTemplate("{{#open}}", {}),
      (err: unknown) =>
        err instanceof RenderError &&
        err.message.startsWith("Could not render template: ")
    );
  });
});
