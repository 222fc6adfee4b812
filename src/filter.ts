/**
 * Clean up leftovers the site injects into the assembled Markdown.
 */

/** Applied in order; removals run before blank lines are collapsed */
const UNWANTED_PATTERNS: ReadonlyArray<RegExp> = [
  // Build-tool comment markers
  /<!--[\s\S]*?-->/g,
  // Theme switcher labels left on their own line
  /^[ \t]*(?:Light|Dark|Auto|System)(?:[ \t]+(?:theme|mode))?[ \t]*$/gim,
  // Version banners such as "v6" or "Version 6.1"
  /^[ \t]*(?:v|version[ \t]*)\d+(?:\.\d+)*[ \t]*$/gim,
  // Stray tab-indented lines. Also hits tab-indented code; see DESIGN.md
  /^\t.*$/gm,
];

/** Two or more consecutive blank (or whitespace-only) lines */
const BLANK_LINE_RUN = /\n(?:[ \t]*\n){2,}/g;

/**
 * Remove unwanted patterns, collapse blank-line runs to a single blank line,
 * and trim the document.
 *
 * @example
 * filterUnwanted('# A\n\n\n\nText<!-- x -->') // '# A\n\nText'
 */
export function filterUnwanted(markdown: string): string {
  let result = markdown;
  for (const pattern of UNWANTED_PATTERNS) {
    result = result.replace(pattern, "");
  }
  return result.replace(BLANK_LINE_RUN, "\n\n").trim();
}
