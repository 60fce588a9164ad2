import { Marked, type Tokens } from "marked";
import { escapeHtml, highlightCode } from "./highlight.js";

interface PendingCodeBlock {
  placeholder: string;
  code: string;
  lang: string;
}

/**
 * Pages are written flat into the output directory, so a link to another
 * markdown file becomes a link to its `.html` sibling.
 * e.g., "../posts/hello.md#intro" -> "hello.html#intro"
 */
export function resolveLink(href: string): string {
  if (/^[a-z][a-z0-9+.-]*:/i.test(href) || href.startsWith("//")) {
    return href;
  }

  if (href.startsWith("#")) {
    return href;
  }

  const [path = "", anchor] = href.split("#");
  if (!/\.md$/i.test(path)) {
    return href;
  }

  const name = path.split("/").pop()?.replace(/\.md$/i, "") ?? "";
  const resolved = `${name}.html`;
  return anchor ? `${resolved}#${anchor}` : resolved;
}

/**
 * Generate a slug from heading text for anchor links
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/<[^>]*>/g, "")
    .replace(/[^\w\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-");
}

/**
 * Create a Marked instance plus the list its code renderer fills with blocks
 * still waiting for syntax highlighting.
 */
export function createMarkdownRenderer(): {
  marked: Marked;
  codeBlocks: PendingCodeBlock[];
} {
  const marked = new Marked();
  const codeBlocks: PendingCodeBlock[] = [];

  marked.use({
    renderer: {
      // Highlighting is async, so leave a placeholder and fill it in later
      code({ text, lang }: Tokens.Code): string {
        const placeholder = `<!--code-block-${codeBlocks.length}-->`;
        codeBlocks.push({ placeholder, code: text, lang: lang || "plaintext" });
        return placeholder;
      },

      link({ href, title, tokens }: Tokens.Link): string {
        const text = this.parser.parseInline(tokens);
        const titleAttr = title ? ` title="${escapeHtml(title)}"` : "";
        return `<a href="${resolveLink(href)}"${titleAttr}>${text}</a>`;
      },

      // H1 is the page title - no anchor needed
      heading({ tokens, depth }: Tokens.Heading): string {
        const text = this.parser.parseInline(tokens);
        if (depth === 1) {
          return `<h1>${text}</h1>\n`;
        }

        const slug = slugify(text);
        return `<h${depth} id="${slug}"><a class="anchor" href="#${slug}">${text}</a></h${depth}>\n`;
      },
    },
  });

  return { marked, codeBlocks };
}

/**
 * Render markdown to HTML
 */
export async function renderMarkdown(markdown: string): Promise<string> {
  const { marked, codeBlocks } = createMarkdownRenderer();
  let html = await marked.parse(markdown);

  for (const block of codeBlocks) {
    const highlighted = await highlightCode(block.code, block.lang);
    html = html.replace(block.placeholder, () => highlighted);
  }

  return html;
}
