#!/usr/bin/env tsx
import { config, parseEnvNumber } from "./config";
import { checkFile, runHook } from "./hook/run-hook";
import { renderAdvisory } from "./reporting/advisory";
import { loadStubRules } from "./scanner/load-rules";
import { sanitizePath } from "./utils/fs";
import { debugLog } from "./utils/log";

type CheckOptions = {
  json: boolean;
  fail: boolean;
  maxErrors: number;
  enableLint: boolean;
  enableStubScan: boolean;
};

function parseArgs(argv: string[]) {
  const args = [...argv];
  const command = args[0] && !args[0].startsWith("-") ? args.shift() ?? "hook" : "hook";
  const targetPath = args[0] && !args[0].startsWith("-") ? args.shift() : undefined;

  const options: CheckOptions = {
    json: false,
    fail: false,
    maxErrors: config.maxErrors,
    enableLint: config.enableLint,
    enableStubScan: config.enableStubScan,
  };
  let help = false;

  while (args.length) {
    const arg = args.shift();
    if (arg === "--json") options.json = true;
    else if (arg === "--fail") options.fail = true;
    else if (arg === "--no-lint") options.enableLint = false;
    else if (arg === "--no-stubs") options.enableStubScan = false;
    else if (arg === "--max-errors") {
      options.maxErrors = Math.max(1, parseEnvNumber(args.shift(), options.maxErrors));
    } else if (arg?.startsWith("--max-errors=")) {
      options.maxErrors = Math.max(1, parseEnvNumber(arg.split("=")[1], options.maxErrors));
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    }
  }

  return { command, targetPath, options, help };
}

function printHelp() {
  const help = `edit-gate - post-write stub and lint check

Usage:
  edit-gate [hook]                 Read a PostToolUse hook record from stdin
  edit-gate check <file> [options] Check a single file and print the advisory
  edit-gate patterns               List the loaded stub patterns

Options (check):
  --json              Print findings, diagnostics and advisory as JSON
  --fail              Exit 1 when anything was reported
  --max-errors <n>    Linter lines to keep (default ${config.maxErrors})
  --no-lint           Skip the linter
  --no-stubs          Skip the stub scan

Environment:
  EDITGATE_STUB_SCAN, EDITGATE_LINT, EDITGATE_MAX_ERRORS, EDITGATE_MAX_FILE_SIZE,
  EDITGATE_PATTERNS, EDITGATE_HOOK_DIR, EDITGATE_DEBUG
`;

  console.log(help);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

async function runHookCommand() {
  const raw = await readStdin();
  const rules = await loadStubRules();
  const output = await runHook(raw, { rules });
  if (output) {
    console.log(output);
  }
}

async function runCheck(targetPath: string, options: CheckOptions) {
  const rules = await loadStubRules();
  const result = await checkFile(sanitizePath(targetPath), {
    rules,
    maxErrors: options.maxErrors,
    enableLint: options.enableLint,
    enableStubScan: options.enableStubScan,
  });

  if (options.json) {
    console.log(JSON.stringify({ ...result, advisory: renderAdvisory(result.advisory) }, null, 2));
  } else {
    console.log(renderAdvisory(result.advisory));
  }

  if (options.fail && result.advisory.kind === "issues") {
    process.exitCode = 1;
  }
}

async function listPatterns() {
  const rules = await loadStubRules();
  for (const rule of rules) {
    console.log(`${rule.id} - ${rule.label}`);
    for (const pattern of rule.patterns) {
      console.log(`  ${pattern}`);
    }
  }
}

const { command, targetPath, options, help } = parseArgs(process.argv.slice(2));

if (help) {
  printHelp();
} else if (command === "hook") {
  // Advisory only: whatever happens, the editing session carries on.
  try {
    await runHookCommand();
  } catch (error) {
    debugLog("hook run aborted", error);
  }
  process.exitCode = 0;
} else if (command === "check" && targetPath) {
  await runCheck(targetPath, options);
} else if (command === "patterns") {
  await listPatterns();
} else {
  printHelp();
  process.exitCode = 1;
}
