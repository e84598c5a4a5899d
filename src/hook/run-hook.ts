import { config } from "../config";
import { lintFile } from "../lint/dispatch";
import type { CommandRunner } from "../lint/run-command";
import { composeAdvisory, renderAdvisory, type Advisory } from "../reporting/advisory";
import type { CompiledRule } from "../scanner/rule-engine";
import { scanFile } from "../scanner/scan-file";
import type { Finding } from "../scanner/types";
import { buildHookOutput, parseHookInput, selectGatedFile } from "./envelope";

export type GateOptions = {
  rules: readonly CompiledRule[];
  runner?: CommandRunner;
  maxErrors?: number;
  enableStubScan?: boolean;
  enableLint?: boolean;
  hookDir?: string;
};

export type CheckResult = {
  file: string;
  findings: Finding[];
  diagnostics: string[];
  advisory: Advisory;
};

/**
 * Runs the stub scan and the linter side by side and merges them into one
 * advisory. Both checks are read-only and absorb their own failures.
 */
export async function checkFile(filePath: string, options: GateOptions): Promise<CheckResult> {
  const enableStubScan = options.enableStubScan ?? config.enableStubScan;
  const enableLint = options.enableLint ?? config.enableLint;

  const [findings, diagnostics] = await Promise.all([
    enableStubScan ? scanFile(filePath, options.rules) : Promise.resolve<Finding[]>([]),
    enableLint
      ? lintFile(filePath, options.maxErrors ?? config.maxErrors, options.runner)
      : Promise.resolve<string[]>([]),
  ]);

  return {
    file: filePath,
    findings,
    diagnostics,
    advisory: composeAdvisory(filePath, findings, diagnostics),
  };
}

/**
 * Handles one raw hook invocation. Returns the JSON line to write to stdout,
 * or null when the gate has nothing to say (malformed input, other tools,
 * ungated files).
 */
export async function runHook(rawInput: string, options: GateOptions): Promise<string | null> {
  const input = parseHookInput(rawInput);
  if (!input) return null;

  const filePath = selectGatedFile(input, options.hookDir ?? config.hookDir);
  if (!filePath) return null;

  const result = await checkFile(filePath, options);
  return JSON.stringify(buildHookOutput(renderAdvisory(result.advisory)));
}
