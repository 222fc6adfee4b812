/**
 * Shared type definitions for the manual builder
 */

/** Describes the documentation site being converted */
export interface SiteProfile {
  /** Protocol and host, without a trailing slash (e.g., 'https://www.tradingview.com') */
  baseUrl: string;
  /** Path prefix every manual page lives under (e.g., '/pine-script-docs') */
  manualPath: string;
  /** Page listing every chapter as a `.page-link` anchor */
  indexUrl: string;
  /** Class tokens that together mark the site's colorized code container */
  codeBlockClasses: readonly string[];
}

/** One chapter discovered on the index page */
export interface ChapterRecord {
  /** One-based position on the index page */
  readonly orderIndex: number;
  /** Absolute URL of the chapter page */
  readonly sourceUrl: string;
  /** Link text from the index page */
  readonly title: string;
  /** Anchor used by the table of contents */
  readonly anchorSlug: string;
  /** Cached raw HTML (e.g., 'output/html/00001_pine-script-docs_welcome.html') */
  readonly cachedPath: string;
}

/** Where a hyperlink in a chapter points once converted */
export type LinkTarget =
  | { kind: "internal-fragment"; fragment: string }
  | { kind: "internal-page"; slug: string }
  | { kind: "external"; url: string };

/** Minimal fetch signature so tests can supply an in-process stand-in */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
