import type { CompiledRule } from "./rule-engine";
import type { Finding } from "./types";
import { config } from "../config";
import { isProbablyBinary, readHead, readText } from "../utils/fs";
import { debugLog } from "../utils/log";
import { scanContent } from "./rule-engine";

/**
 * Best-effort stub scan of a file on disk. Missing, oversized, binary or
 * unreadable files produce no findings.
 */
export async function scanFile(
  filePath: string,
  rules: readonly CompiledRule[],
  maxBytes: number = config.maxFileSize
): Promise<Finding[]> {
  try {
    const sample = await readHead(filePath);
    if (isProbablyBinary(sample)) return [];

    const content = await readText(filePath, maxBytes);
    return scanContent(content, rules);
  } catch (error) {
    debugLog(`stub scan skipped for ${filePath}`, error);
    return [];
  }
}
