/**
 * Removes terminal escape sequences (colors, cursor movement, OSC titles and
 * links) from worker output so they never reach observers.
 */

import stripAnsi from "strip-ansi";

/**
 * Strip every ANSI/VT escape sequence from `text`; all other characters,
 * including internal whitespace, are kept. Idempotent.
 */
export function sanitizeLine(text: string): string {
  return stripAnsi(text);
}
