import { createHighlighter, type Highlighter } from "shiki";

const THEMES = { light: "github-light", dark: "github-dark" } as const;

/** Grammars loaded up front; a fence naming anything else renders as plaintext */
export const CODE_LANGUAGES: readonly string[] = [
  "bash", "css", "diff", "html", "javascript", "json", "jsx", "markdown",
  "python", "shell", "sql", "toml", "tsx", "typescript", "xml", "yaml",
];

const LANGUAGE_ALIASES: Record<string, string> = {
  js: "javascript",
  md: "markdown",
  py: "python",
  sh: "bash",
  ts: "typescript",
  yml: "yaml",
};

let highlighter: Promise<Highlighter> | undefined;

// Loaded on the first fenced block, so sites without code never pay for it
function loadHighlighter(): Promise<Highlighter> {
  highlighter ??= createHighlighter({
    themes: Object.values(THEMES),
    langs: [...CODE_LANGUAGES],
  });
  return highlighter;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Map a fence's info string to a loaded grammar name, or "plaintext".
 * e.g., "TS" -> "typescript", "brainfuck" -> "plaintext"
 */
export function resolveLanguage(lang: string): string {
  const name = lang.trim().toLowerCase();
  const resolved = LANGUAGE_ALIASES[name] ?? name;
  return CODE_LANGUAGES.includes(resolved) ? resolved : "plaintext";
}

/**
 * Highlight a fenced code block with light and dark themes.
 */
export async function highlightCode(code: string, lang: string): Promise<string> {
  const shiki = await loadHighlighter();
  return shiki.codeToHtml(code, { lang: resolveLanguage(lang), themes: THEMES });
}
