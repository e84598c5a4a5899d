import { extname } from "path";
import { isWithinDir } from "../utils/fs";
import type { HookInput, HookOutput } from "./types";
import { GATED_EXTENSIONS, WRITE_TOOLS } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Returns null for anything that is not a well-formed hook record. */
export function parseHookInput(raw: string): HookInput | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (!isRecord(parsed)) return null;
  const { tool_name: toolName, tool_input: toolInput } = parsed;
  if (typeof toolName !== "string" || !isRecord(toolInput)) return null;
  const filePath = toolInput.file_path;
  if (typeof filePath !== "string" || !filePath) return null;

  return { tool_name: toolName, tool_input: { file_path: filePath } };
}

/**
 * The file the gate should check, or null when the invocation is not ours:
 * a non-writing tool, an extension outside the gated set, or a file inside
 * the gate's own directory (editing the gate must not re-trigger it).
 */
export function selectGatedFile(input: HookInput, hookDir: string): string | null {
  if (!WRITE_TOOLS.has(input.tool_name)) return null;

  const filePath = input.tool_input.file_path;
  if (!GATED_EXTENSIONS.has(extname(filePath).toLowerCase())) return null;
  if (isWithinDir(filePath, hookDir)) return null;

  return filePath;
}

export function buildHookOutput(additionalContext: string): HookOutput {
  return {
    hookSpecificOutput: {
      hookEventName: "PostToolUse",
      additionalContext,
    },
  };
}
