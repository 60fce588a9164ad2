import {
  compareByDateDescending,
  type Page,
  type Site,
} from "../content/types.js";

export type FeedRenderer = (site: Site) => string;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function joinUrl(base: string, path: string): string {
  if (!base) return path;
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

function renderItem(site: Site, post: Page): string {
  const link = joinUrl(site.config.url, post.frontmatter.permalink);
  const lines = [
    "    <item>",
    `      <title>${escapeXml(post.frontmatter.title)}</title>`,
    `      <link>${escapeXml(link)}</link>`,
    `      <guid>${escapeXml(link)}</guid>`,
  ];

  if (post.frontmatter.date) {
    lines.push(`      <pubDate>${post.frontmatter.date.toUTCString()}</pubDate>`);
  }

  const description = post.frontmatter.description;
  if (typeof description === "string" && description !== "") {
    lines.push(`      <description>${escapeXml(description)}</description>`);
  }

  lines.push("    </item>");
  return lines.join("\n");
}

/**
 * Render an RSS 2.0 document for the site's posts.
 */
export function renderFeed(site: Site): string {
  const { config } = site;
  const posts = [...site.posts].sort(compareByDateDescending);
  const newest = posts.find((post) => post.frontmatter.date)?.frontmatter.date;

  const channel = [
    `    <title>${escapeXml(config.title)}</title>`,
    `    <link>${escapeXml(config.url)}</link>`,
    `    <description>${escapeXml(config.description)}</description>`,
  ];
  if (newest) {
    channel.push(`    <lastBuildDate>${newest.toUTCString()}</lastBuildDate>`);
  }

  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<rss version="2.0">`,
    `  <channel>`,
    ...channel,
    ...posts.map((post) => renderItem(site, post)),
    `  </channel>`,
    `</rss>`,
    "",
  ].join("\n");
}
