import { sanitizePath } from "../utils/fs";
import { debugLog } from "../utils/log";
import { findProjectRoot } from "./project-root";
import { runCommand, type CommandResult, type CommandRunner } from "./run-command";
import { findToolchain } from "./toolchains";
import type { CommandSpec } from "./types";

export const DEFAULT_MAX_ERRORS = 10;

function expandArgv(spec: CommandSpec, filePath: string): string[] {
  return spec.argv.map((arg) => (arg === "{file}" ? filePath : arg));
}

/**
 * Keeps the first `maxErrors` non-blank lines of the command's designated
 * stream that pass its filter, each cut to the command's length budget.
 */
export function extractDiagnostics(output: string, spec: CommandSpec, maxErrors: number): string[] {
  const diagnostics: string[] = [];
  if (maxErrors <= 0) return diagnostics;

  for (const rawLine of output.split("\n")) {
    const line = rawLine.trim();
    if (!line || !spec.lineFilter(line)) continue;

    diagnostics.push(line.slice(0, spec.maxLineLength));
    if (diagnostics.length >= maxErrors) break;
  }

  return diagnostics;
}

function foldResult(result: CommandResult, spec: CommandSpec, maxErrors: number): string[] {
  switch (result.kind) {
    case "completed":
      // Linters exit non-zero when they find something; the exit code says nothing more.
      return extractDiagnostics(result[spec.outputStream], spec, maxErrors);
    case "timeout":
      if (maxErrors <= 0) return [];
      return [`${spec.name} timed out after ${spec.timeoutSeconds}s`.slice(0, spec.maxLineLength)];
    case "unavailable":
      debugLog(`${spec.name} unavailable (${result.reason})`);
      return [];
  }
}

/**
 * Runs the linter registered for the file's extension and returns at most
 * `maxErrors` diagnostic lines. Never throws: unsupported files, missing
 * project roots and missing tools all come back as an empty list.
 */
export async function lintFile(
  filePath: string,
  maxErrors = DEFAULT_MAX_ERRORS,
  runner: CommandRunner = runCommand
): Promise<string[]> {
  const toolchain = findToolchain(filePath);
  if (!toolchain) return [];

  const absolutePath = sanitizePath(filePath);

  try {
    const root = await findProjectRoot(absolutePath, toolchain.rootMarkers);
    if (toolchain.requiresRoot && !root) {
      debugLog(`no ${toolchain.id} project root above ${absolutePath}`);
      return [];
    }

    const cwd = root ?? undefined;
    let spec: CommandSpec = toolchain;
    let result = await runner(expandArgv(spec, absolutePath), {
      cwd,
      timeoutMs: spec.timeoutSeconds * 1000,
    });

    if (result.kind === "unavailable" && toolchain.fallback) {
      spec = toolchain.fallback;
      result = await runner(expandArgv(spec, absolutePath), {
        cwd,
        timeoutMs: spec.timeoutSeconds * 1000,
      });
    }

    return foldResult(result, spec, maxErrors);
  } catch (error) {
    debugLog(`lint failed for ${absolutePath}`, error);
    return [];
  }
}
