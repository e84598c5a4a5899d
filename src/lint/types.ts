export type OutputStream = "stdout" | "stderr";

export type ToolchainId = "rust" | "python" | "javascript" | "go";

/** One external command and the rules for reading its output. */
export type CommandSpec = {
  /** Name used in diagnostics about the command itself, e.g. timeouts. */
  name: string;
  /** Argument vector; `{file}` is replaced with the absolute file path. */
  argv: string[];
  timeoutSeconds: number;
  outputStream: OutputStream;
  /** Applied to trimmed, non-blank lines. */
  lineFilter: (line: string) => boolean;
  maxLineLength: number;
};

export type ToolchainSpec = CommandSpec & {
  id: ToolchainId;
  extensions: string[];
  rootMarkers: string[];
  /** Skip the toolchain entirely when no project root is found. */
  requiresRoot: boolean;
  /** Run when the primary command is not installed. */
  fallback?: CommandSpec;
};
