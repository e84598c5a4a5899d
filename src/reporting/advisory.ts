import type { Finding } from "../scanner/types";

export const MAX_LISTED_FINDINGS = 5;
export const MAX_LISTED_DIAGNOSTICS = 10;

export type Advisory =
  | { kind: "issues"; stubSection?: string; lintSection?: string }
  | { kind: "clean"; cleanMessage: string };

export function formatStubSection(filePath: string, findings: readonly Finding[]): string {
  const lines = [`STUB PATTERNS DETECTED in ${filePath}:`];

  for (const finding of findings.slice(0, MAX_LISTED_FINDINGS)) {
    lines.push(`  Line ${finding.line}: ${finding.label} - \`${finding.excerpt}\``);
  }
  if (findings.length > MAX_LISTED_FINDINGS) {
    lines.push(`  ... and ${findings.length - MAX_LISTED_FINDINGS} more`);
  }

  lines.push("");
  lines.push("Fix these NOW - replace with real implementation.");
  return lines.join("\n");
}

export function formatLintSection(diagnostics: readonly string[]): string {
  const lines = ["LINTER ISSUES:"];

  for (const diagnostic of diagnostics.slice(0, MAX_LISTED_DIAGNOSTICS)) {
    lines.push(`  ${diagnostic}`);
  }
  if (diagnostics.length > MAX_LISTED_DIAGNOSTICS) {
    lines.push("  ... and more");
  }

  return lines.join("\n");
}

export function composeAdvisory(
  filePath: string,
  findings: readonly Finding[],
  diagnostics: readonly string[]
): Advisory {
  if (!findings.length && !diagnostics.length) {
    return { kind: "clean", cleanMessage: `${filePath} - no issues detected` };
  }

  return {
    kind: "issues",
    stubSection: findings.length ? formatStubSection(filePath, findings) : undefined,
    lintSection: diagnostics.length ? formatLintSection(diagnostics) : undefined,
  };
}

/** Stub block first, lint block second, separated by a blank line. */
export function renderAdvisory(advisory: Advisory): string {
  if (advisory.kind === "clean") return advisory.cleanMessage;

  return [advisory.stubSection, advisory.lintSection]
    .filter((section): section is string => Boolean(section))
    .join("\n\n");
}
