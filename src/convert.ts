/**
 * Convert a sanitized chapter tree into Markdown.
 *
 * Every element is classified into a closed set of kinds and rendered by the
 * matching case; tags the converter does not know are passed through, so only
 * their children are rendered.
 *
 * Links into the manual become in-document anchors: a link carrying a fragment
 * keeps it verbatim, a link to a whole page points at the slug of the page's
 * last path segment.
 */

import { HTMLElement, type Node, TextNode } from "node-html-parser";
import { sanitize } from "./sanitize.js";
import type { LinkTarget, SiteProfile } from "./types.js";
import { hasScheme, resolveUrl, slug } from "./utils.js";

export interface ConvertOptions {
  site: SiteProfile;
  /** URL of the page being converted; relative links resolve against it */
  pageUrl?: string;
}

/** Inline code longer than this is promoted to a fenced block */
const INLINE_CODE_LIMIT = 80;

const FENCE = "```";

export type ElementKind =
  | { kind: "heading"; level: number }
  | { kind: "block" }
  | { kind: "list"; ordered: boolean }
  | { kind: "code-block" }
  | { kind: "inline-code" }
  | { kind: "link" }
  | { kind: "strong" }
  | { kind: "emphasis" }
  | { kind: "image" }
  | { kind: "line-break" }
  | { kind: "passthrough" };

function tagName(element: HTMLElement): string {
  return element.tagName ? element.tagName.toLowerCase() : "";
}

function isColorizedCode(element: HTMLElement, site: SiteProfile): boolean {
  return site.codeBlockClasses.length > 0 && site.codeBlockClasses.every((name) => element.classList.contains(name));
}

/**
 * Decide how an element is rendered.
 */
export function classifyElement(element: HTMLElement, site: SiteProfile): ElementKind {
  if (isColorizedCode(element, site)) {
    return { kind: "code-block" };
  }

  const tag = tagName(element);
  const heading = /^h([1-6])$/.exec(tag);
  if (heading) {
    return { kind: "heading", level: Number(heading[1]) };
  }

  switch (tag) {
    case "p":
    case "div":
      return { kind: "block" };
    case "ul":
      return { kind: "list", ordered: false };
    case "ol":
      return { kind: "list", ordered: true };
    case "pre":
      return { kind: "code-block" };
    case "code":
      return { kind: "inline-code" };
    case "a":
      return { kind: "link" };
    case "strong":
    case "b":
      return { kind: "strong" };
    case "em":
    case "i":
      return { kind: "emphasis" };
    case "img":
      return { kind: "image" };
    case "br":
      return { kind: "line-break" };
    default:
      return { kind: "passthrough" };
  }
}

/** True when an ancestor of the node is a code block or inline code */
function isInsideCode(node: Node, site: SiteProfile): boolean {
  let current: HTMLElement | null = node.parentNode;
  while (current) {
    const tag = tagName(current);
    if (tag === "pre" || tag === "code" || isColorizedCode(current, site)) {
      return true;
    }
    current = current.parentNode;
  }
  return false;
}

function toAbsoluteUrl(ref: string, baseUrl: string): string {
  if (hasScheme(ref)) return ref;
  return resolveUrl(ref, baseUrl) ?? ref;
}

function isUnderManual(url: URL, site: SiteProfile): boolean {
  const base = new URL(site.baseUrl);
  const manualPath = site.manualPath.replace(/\/+$/, "");
  return url.origin === base.origin && (url.pathname === manualPath || url.pathname.startsWith(`${manualPath}/`));
}

/**
 * Classify a hyperlink. Hrefs without a scheme resolve against the page URL,
 * or the site's base URL when no page URL is known.
 *
 * @example
 * classifyLink('/docs/intro/#setup', site) // { kind: 'internal-fragment', fragment: 'setup' }
 * classifyLink('/docs/intro/', site) // { kind: 'internal-page', slug: 'intro' }
 */
export function classifyLink(href: string, site: SiteProfile, pageUrl?: string): LinkTarget {
  const absolute = toAbsoluteUrl(href, pageUrl ?? site.baseUrl);

  let url: URL;
  try {
    url = new URL(absolute);
  } catch {
    return { kind: "external", url: href };
  }

  if (!isUnderManual(url, site)) {
    return { kind: "external", url: absolute };
  }

  const hashIndex = href.indexOf("#");
  if (url.hash && hashIndex !== -1) {
    return { kind: "internal-fragment", fragment: href.slice(hashIndex + 1) };
  }

  const segments = url.pathname.split("/").filter(Boolean);
  const lastSegment = segments.length > 0 ? segments[segments.length - 1] : "";
  return { kind: "internal-page", slug: slug(lastSegment) };
}

function linkDestination(target: LinkTarget): string {
  switch (target.kind) {
    case "internal-fragment":
      return `#${target.fragment}`;
    case "internal-page":
      return `#${target.slug}`;
    case "external":
      return target.url;
  }
}

function fencedBlock(text: string): string {
  return `${FENCE}\n${text.replace(/\n+$/, "")}\n${FENCE}\n\n`;
}

function convertChildren(element: HTMLElement, options: ConvertOptions): string {
  return element.childNodes.map((child) => convert(child, options)).join("");
}

function convertText(node: TextNode, options: ConvertOptions): string {
  const text = node.text;
  if (/^\s*$/.test(text)) {
    return isInsideCode(node, options.site) ? text : "";
  }
  return text;
}

function isList(node: Node, site: SiteProfile): boolean {
  return node instanceof HTMLElement && classifyElement(node, site).kind === "list";
}

function convertListItem(item: HTMLElement, options: ConvertOptions): string {
  let content = "";
  for (const child of item.childNodes) {
    const part = convert(child, options);
    // A nested list must start on its own line to be read as a list
    if (part && content && !content.endsWith("\n") && isList(child, options.site)) {
      content += "\n";
    }
    content += part;
  }
  return content.trim();
}

function convertList(list: HTMLElement, ordered: boolean, options: ConvertOptions): string {
  let markdown = "";
  let number = 1;

  for (const item of list.childNodes) {
    if (!(item instanceof HTMLElement) || tagName(item) !== "li") continue;

    const marker = ordered ? `${number}. ` : "- ";
    const content = convertListItem(item, options).replace(/\n/g, `\n${" ".repeat(marker.length)}`);
    markdown += `${marker}${content}\n`;
    number++;
  }

  return `${markdown}\n`;
}

function convertInlineCode(element: HTMLElement, options: ConvertOptions): string {
  const text = element.text;
  if (isInsideCode(element, options.site)) {
    return text;
  }
  if (text.includes("\n") || text.length > INLINE_CODE_LIMIT) {
    return fencedBlock(text);
  }
  return text.includes("`") ? `\`\`${text}\`\`` : `\`${text}\``;
}

function convertLink(element: HTMLElement, options: ConvertOptions): string {
  const text = convertChildren(element, options).trim();
  const href = element.getAttribute("href");
  if (!href) {
    return text;
  }
  const target = classifyLink(href, options.site, options.pageUrl);
  return `[${text}](${linkDestination(target)})`;
}

function convertImage(element: HTMLElement, options: ConvertOptions): string {
  const src = element.getAttribute("src");
  if (!src) {
    return "";
  }
  const alt = element.getAttribute("alt") ?? "";
  return `![${alt}](${toAbsoluteUrl(src, options.pageUrl ?? options.site.baseUrl)})`;
}

function unhandledKind(kind: never): never {
  throw new Error(`Unhandled element kind: ${JSON.stringify(kind)}`);
}

function convertElement(element: HTMLElement, options: ConvertOptions): string {
  const kind = classifyElement(element, options.site);

  switch (kind.kind) {
    case "heading":
      return `${"#".repeat(kind.level)} ${convertChildren(element, options).trim()}\n\n`;
    case "block": {
      const content = convertChildren(element, options).trim();
      return content ? `${content}\n\n` : "";
    }
    case "list":
      return convertList(element, kind.ordered, options);
    case "code-block":
      return fencedBlock(element.text);
    case "inline-code":
      return convertInlineCode(element, options);
    case "link":
      return convertLink(element, options);
    case "strong":
      return `**${convertChildren(element, options).trim()}**`;
    case "emphasis":
      return `*${convertChildren(element, options).trim()}*`;
    case "image":
      return convertImage(element, options);
    case "line-break":
      return "  \n";
    case "passthrough":
      return convertChildren(element, options);
    default:
      return unhandledKind(kind);
  }
}

/**
 * Render a node and its subtree as Markdown.
 * Comments and other non-element, non-text nodes render as nothing.
 */
export function convert(node: Node, options: ConvertOptions): string {
  if (node instanceof TextNode) {
    return convertText(node, options);
  }
  if (node instanceof HTMLElement) {
    return convertElement(node, options);
  }
  return "";
}

/**
 * Sanitize a raw chapter page and convert its body to Markdown.
 */
export function htmlToMarkdown(raw: Buffer | string, options: ConvertOptions): string {
  const root = sanitize(raw);
  const body = root.querySelector("body") ?? root;
  return body.childNodes
    .map((child) => convert(child, options))
    .join("")
    .trim();
}
