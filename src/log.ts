/**
 * Diagnostic logging to stderr. Stdout is reserved for the status line and
 * the final summary.
 */

let verboseEnabled = false;

export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

export function log(msg: string): void {
  const ts = new Date().toISOString().slice(11, 23);
  console.error(`  [${ts}] ${msg}`);
}

/** Logs only when -v/--verbose is on. */
export function debug(msg: string): void {
  if (verboseEnabled) log(msg);
}
