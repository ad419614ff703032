/**
 * Warning output for the frameworks package.
 *
 * Warnings go through a sink so callers (and tests) can capture them;
 * the default writes to the console with a `[frameworks]` prefix.
 */

export type WarningSink = (message: string) => void;

export const LOG_TAG = "frameworks";

export const consoleWarningSink: WarningSink = (message) => {
  console.warn(`[${LOG_TAG}] ${message}`);
};
