// Content extraction: turns a fetched body into text an LLM can read.
// HTML goes through Readability, falling back to boilerplate stripping
// when no article can be found.

import { Readability } from "@mozilla/readability";
import { convert, type SelectorDefinition } from "html-to-text";
import { JSDOM } from "jsdom";

export type ExtractMode = "markdown" | "text";
export type Extractor = "json" | "readability" | "raw";

export interface ExtractInput {
  readonly body: string;
  readonly contentType: string;
  /** Final URL, used to resolve relative links. */
  readonly url: string;
  readonly extractMode: ExtractMode;
  readonly maxChars: number;
}

export interface ExtractedContent {
  readonly text: string;
  readonly extractor: Extractor;
  readonly truncated: boolean;
}

const BASE_SELECTORS: SelectorDefinition[] = [
  { selector: "script", format: "skip" },
  { selector: "style", format: "skip" },
  { selector: "noscript", format: "skip" },
  { selector: "img", format: "skip" },
  { selector: "h1", options: { uppercase: false } },
  { selector: "h2", options: { uppercase: false } },
  { selector: "h3", options: { uppercase: false } },
  { selector: "h4", options: { uppercase: false } },
  { selector: "h5", options: { uppercase: false } },
  { selector: "h6", options: { uppercase: false } },
  { selector: "ul", options: { itemPrefix: "- " } },
];

const MARKDOWN_SELECTORS: SelectorDefinition[] = [
  ...BASE_SELECTORS,
  // Links are rewritten to [text](href) before conversion.
  { selector: "a", options: { ignoreHref: true } },
  { selector: "table", format: "dataTable" },
];

const TEXT_SELECTORS: SelectorDefinition[] = [
  ...BASE_SELECTORS,
  { selector: "a", options: { ignoreHref: true } },
];

export function isHtml(contentType: string, body: string): boolean {
  if (contentType.includes("text/html") || contentType.includes("application/xhtml")) return true;
  const head = body.trimStart().slice(0, 256).toLowerCase();
  return head.startsWith("<!doctype") || head.startsWith("<html");
}

export function extractContent(input: ExtractInput): ExtractedContent {
  const { body, contentType, url, extractMode, maxChars } = input;

  let text: string;
  let extractor: Extractor;

  if (contentType.includes("application/json")) {
    const pretty = prettyJson(body);
    text = pretty ?? body;
    extractor = pretty === null ? "raw" : "json";
  } else if (isHtml(contentType, body)) {
    text = htmlToReadable(body, url, extractMode);
    extractor = "readability";
  } else {
    text = body;
    extractor = "raw";
  }

  const truncated = text.length > maxChars;
  return { text: truncated ? text.slice(0, maxChars) : text, extractor, truncated };
}

function prettyJson(body: string): string | null {
  try {
    return JSON.stringify(JSON.parse(body), null, 2);
  } catch {
    return null;
  }
}

/** Article title plus body, as markdown-like or plain text. */
export function htmlToReadable(html: string, url: string, mode: ExtractMode): string {
  const article = readArticle(html, url);
  const title = article?.title || titleOf(html);
  const contentHtml = article?.content ?? stripBoilerplate(html);

  const text = mode === "markdown" ? toMarkdown(contentHtml, url) : toText(contentHtml);
  return title ? `# ${title}\n\n${text}` : text;
}

function readArticle(html: string, url: string): { title: string; content: string } | null {
  let dom: JSDOM;
  try {
    dom = new JSDOM(html, { url });
  } catch {
    return null;
  }
  try {
    const article = new Readability(dom.window.document).parse();
    if (!article || !article.content) return null;
    return { title: (article.title ?? "").trim(), content: article.content };
  } catch {
    return null;
  } finally {
    dom.window.close();
  }
}

function resolveHref(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}

function titleOf(html: string): string {
  const match = html.match(/<title[^>]*>([^<]*)<\/title>/i);
  return match?.[1] ? match[1].trim() : "";
}

function toText(html: string): string {
  return collapseWhitespace(convert(html, { wordwrap: false, selectors: TEXT_SELECTORS }));
}

/**
 * Rewrite headings to `#` prefixes and links to `[text](href)` on a DOM,
 * then let html-to-text lay out the blocks.
 */
function toMarkdown(html: string, url: string): string {
  const dom = new JSDOM(`<!doctype html><html><body>${html}</body></html>`, { url });
  try {
    const doc = dom.window.document;

    for (const anchor of Array.from(doc.querySelectorAll("a[href]"))) {
      const label = (anchor.textContent ?? "").replace(/\s+/g, " ").trim();
      const href = anchor.getAttribute("href") ?? "";
      if (!label || href.startsWith("javascript:")) continue;
      anchor.replaceWith(doc.createTextNode(`[${label}](${resolveHref(href, url)})`));
    }

    for (let level = 1; level <= 6; level++) {
      for (const heading of Array.from(doc.querySelectorAll(`h${level}`))) {
        heading.insertBefore(doc.createTextNode(`${"#".repeat(level)} `), heading.firstChild);
      }
    }

    return collapseWhitespace(convert(doc.body.innerHTML, { wordwrap: false, selectors: MARKDOWN_SELECTORS }));
  } finally {
    dom.window.close();
  }
}

// ── Boilerplate stripping ─────────────────────────────────────────────
// Used when Readability finds no article.

/**
 * Strip boilerplate elements (nav, header, footer, menus, ads, etc.)
 * from raw HTML, keeping only the main content.
 *
 *   1. Try to extract <main>, <article>, or role="main" content
 *   2. If found, use that as the page body
 *   3. Always strip known boilerplate tags regardless
 */
export function stripBoilerplate(html: string): string {
  const source = extractMainContent(html) ?? html;
  return removeBoilerplateTags(source);
}

function extractMainContent(html: string): string | null {
  const patterns = [
    /<main[\s>][\s\S]*?<\/main>/i,
    /<[^>]+role\s*=\s*["']main["'][^>]*>[\s\S]*?<\/[^>]+>/i,
    /<article[\s>][\s\S]*?<\/article>/i,
  ];

  for (const pattern of patterns) {
    const match = html.match(pattern);
    if (match && match[0].length > 200) {
      return match[0];
    }
  }

  return null;
}

const BOILERPLATE_PATTERNS: RegExp[] = [
  /<nav[\s>][\s\S]*?<\/nav>/gi,
  /<header[\s>][\s\S]*?<\/header>/gi,
  /<footer[\s>][\s\S]*?<\/footer>/gi,
  /<[^>]+role\s*=\s*["'](?:navigation|banner|contentinfo|complementary|search)["'][\s\S]*?<\/[^>]+>/gi,
  /<[^>]+(?:class|id)\s*=\s*["'][^"']*(?:cookie|consent|popup|modal|overlay|newsletter|subscribe|banner|mega-?menu|site-?header|site-?footer|breadcrumb)[\s\S]*?<\/(?:div|section|aside|dialog)>/gi,
  /<script[\s>][\s\S]*?<\/script>/gi,
  /<style[\s>][\s\S]*?<\/style>/gi,
  /<noscript[\s>][\s\S]*?<\/noscript>/gi,
  /<svg[\s>][\s\S]*?<\/svg>/gi,
  /<iframe[\s>][\s\S]*?<\/iframe>/gi,
  /<!--[\s\S]*?-->/g,
];

function removeBoilerplateTags(html: string): string {
  let result = html;
  for (const pattern of BOILERPLATE_PATTERNS) {
    result = result.replace(pattern, "");
  }
  return result;
}

/** Trim line ends and collapse runs of 3+ newlines into 2. */
export function collapseWhitespace(text: string): string {
  return text
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
