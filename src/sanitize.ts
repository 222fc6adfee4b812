/**
 * Strip page chrome from a chapter before it reaches the converter.
 *
 * Breadcrumbs and the "On this page" widget are cut from the raw bytes, since
 * their fragments confuse the parser; navigation, sidebars, headers, footers
 * and script-like elements are removed from the parsed tree.
 */

import { type HTMLElement, parse } from "node-html-parser";

const BREADCRUMB_MARKER = '<div class="breadcrumb"';
const ON_THIS_PAGE_MARKER = "<h2>On this page";
const CONTAINER_OPEN = "<div";
const CONTAINER_CLOSE = "</div>";

/** Elements removed from the parsed tree */
const CHROME_SELECTOR = "nav, aside, header, footer, script, style, noscript, template";

function cut(content: Buffer, start: number, end: number): Buffer {
  return Buffer.concat([content.subarray(0, start), content.subarray(end)]);
}

/**
 * Remove the breadcrumb block and the "On this page" container from raw HTML.
 * Either marker may be missing; the input is then returned unchanged.
 */
export function stripChrome(raw: Buffer | string): Buffer {
  let content = typeof raw === "string" ? Buffer.from(raw, "utf-8") : raw;

  const breadcrumbStart = content.indexOf(BREADCRUMB_MARKER);
  if (breadcrumbStart !== -1) {
    const breadcrumbEnd = content.indexOf(CONTAINER_CLOSE, breadcrumbStart);
    if (breadcrumbEnd !== -1) {
      content = cut(content, breadcrumbStart, breadcrumbEnd + CONTAINER_CLOSE.length);
    }
  }

  const marker = content.indexOf(ON_THIS_PAGE_MARKER);
  if (marker !== -1) {
    const containerStart = content.lastIndexOf(CONTAINER_OPEN, marker);
    const containerEnd = content.indexOf(CONTAINER_CLOSE, marker);
    if (containerStart !== -1 && containerEnd !== -1) {
      content = cut(content, containerStart, containerEnd + CONTAINER_CLOSE.length);
    }
  }

  return content;
}

/**
 * Parse a chapter page with its chrome removed.
 *
 * @returns Root of the parsed document
 */
export function sanitize(raw: Buffer | string): HTMLElement {
  const html = stripChrome(raw).toString("utf-8");
  const root = parse(html, {
    comment: false,
    blockTextElements: { script: true, noscript: true, style: true },
  });

  for (const element of root.querySelectorAll(CHROME_SELECTOR)) {
    element.remove();
  }

  return root;
}
