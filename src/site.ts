import type { SiteProfile } from "./types.js";

const BASE_URL = "https://www.tradingview.com";
const MANUAL_PATH = "/pine-script-docs";

/** Pine Script v6 User Manual */
export const DEFAULT_SITE: SiteProfile = {
  baseUrl: BASE_URL,
  manualPath: MANUAL_PATH,
  indexUrl: BASE_URL + MANUAL_PATH,
  codeBlockClasses: ["pine-colorizer", "code-block"],
};
