/**
 * Logging sinks. Components receive a Logger instead of writing to the console,
 * so the conversion pipeline can run silently under test.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(`Warning: ${message}`),
  error: (message) => console.error(`Error: ${message}`),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Called once per converted chapter */
export type ProgressCallback = (current: number, total: number, title: string) => void;

/**
 * Display a progress bar in the terminal.
 * Shows percentage, counts, and current item title.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param title - Title of the current item being processed
 */
export function progressBar(current: number, total: number, title: string): void {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  // Truncate title to fit in terminal
  const maxTitleLen = 40;
  const shortTitle = title.length > maxTitleLen ? `${title.slice(0, maxTitleLen - 3)}...` : title.padEnd(maxTitleLen);

  process.stdout.write(`\r[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortTitle}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}
