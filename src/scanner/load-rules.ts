import { fileURLToPath } from "url";
import { config } from "../config";
import { debugLog } from "../utils/log";
import { loadRulesFromFile, type CompiledRule } from "./rule-engine";

export const BUNDLED_PATTERNS_PATH = fileURLToPath(new URL("../rules/stub-patterns.yaml", import.meta.url));

/**
 * Loads the first pattern file that parses into at least one rule.
 * Candidates that fail are skipped; an empty table is returned when none load.
 */
export async function loadStubRules(candidates?: string[]): Promise<CompiledRule[]> {
  const paths = candidates ?? [config.patternsPath, BUNDLED_PATTERNS_PATH].filter(
    (path): path is string => Boolean(path)
  );

  for (const candidate of paths) {
    try {
      const rules = await loadRulesFromFile(candidate);
      if (rules.length) return rules;
      debugLog(`no usable rules in ${candidate}`);
    } catch (error) {
      debugLog(`skipping pattern file ${candidate}`, error);
    }
  }

  return [];
}
