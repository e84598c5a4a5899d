import { config } from "../config";

/**
 * stdout belongs to the hook protocol, so diagnostics about the gate itself
 * go to stderr and only when EDITGATE_DEBUG is set.
 */
export function debugLog(message: string, error?: unknown): void {
  if (!config.debug) return;
  const detail = error instanceof Error ? `: ${error.message}` : error !== undefined ? `: ${String(error)}` : "";
  console.error(`[edit-gate] ${message}${detail}`);
}
