/**
 * Wire types for the post-tool-use hook protocol
 */
export type HookInput = {
  tool_name: string;
  tool_input: {
    file_path: string;
  };
};

export type HookOutput = {
  hookSpecificOutput: {
    hookEventName: "PostToolUse";
    additionalContext: string;
  };
};

/**
 * Tools that write files and should trigger the gate
 */
export const WRITE_TOOLS = new Set(["Write", "Edit"]);

/**
 * Source files the gate looks at; anything else is ignored outright
 */
export const GATED_EXTENSIONS = new Set([
  ".py",
  ".rs",
  ".js",
  ".jsx",
  ".ts",
  ".tsx",
  ".mjs",
  ".cjs",
  ".go",
  ".java",
  ".c",
  ".cpp",
  ".h",
  ".hpp",
  ".rb",
  ".sh",
]);
