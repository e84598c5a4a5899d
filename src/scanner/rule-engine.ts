import { parse as parseYaml } from "yaml";
import type { Finding, PatternRule } from "./types";
import { MAX_EXCERPT_LENGTH } from "./types";
import { readText } from "../utils/fs";

export type CompiledRule = PatternRule & {
  _compiled: RegExp[];
  _excludeCompiled: RegExp[];
};

export async function loadRulesFromFile(rulesPath: string): Promise<CompiledRule[]> {
  const content = await readText(rulesPath);
  return loadRulesFromText(content);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}

function compilePattern(pattern: string): RegExp | null {
  // Pattern files written for other engines often carry an inline (?i);
  // every rule is case-insensitive here anyway.
  const normalized = pattern.replace(/\(\?i\)/g, "");
  try {
    return new RegExp(normalized, "i");
  } catch {
    return null;
  }
}

function compileAll(patterns: string[]): RegExp[] {
  return patterns
    .map((pattern) => compilePattern(pattern))
    .filter((re): re is RegExp => re !== null);
}

export function loadRulesFromText(content: string): CompiledRule[] {
  const parsed: unknown = parseYaml(content);
  if (!Array.isArray(parsed)) {
    throw new Error("Pattern file must contain a YAML array of rules.");
  }

  const rules: CompiledRule[] = [];

  for (const raw of parsed) {
    if (!isRecord(raw)) continue;
    const { id, label, description } = raw;
    if (typeof id !== "string" || typeof label !== "string") continue;

    const patterns = toStringList(raw.patterns);
    const excludePatterns = toStringList(raw.exclude_patterns);
    const compiled = compileAll(patterns);
    if (!compiled.length) continue;

    rules.push({
      id,
      label,
      patterns,
      description: typeof description === "string" ? description : undefined,
      exclude_patterns: excludePatterns.length ? excludePatterns : undefined,
      _compiled: compiled,
      _excludeCompiled: compileAll(excludePatterns),
    });
  }

  return rules;
}

export function toExcerpt(line: string): string {
  return line.trim().slice(0, MAX_EXCERPT_LENGTH);
}

function matchesRule(rule: CompiledRule, line: string): boolean {
  return rule._compiled.some((re) => re.test(line));
}

function isExcluded(rule: CompiledRule, line: string): boolean {
  if (!rule._excludeCompiled.length) return false;
  return rule._excludeCompiled.some((re) => re.test(line));
}

/**
 * Applies every rule to every line. A line contributes at most one finding
 * per rule; findings come out by line number, then by rule order.
 */
export function scanContent(content: string, rules: readonly CompiledRule[]): Finding[] {
  const findings: Finding[] = [];
  const lines = content.split("\n");

  lines.forEach((rawLine, index) => {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

    for (const rule of rules) {
      if (!matchesRule(rule, line)) continue;
      if (isExcluded(rule, line)) continue;

      findings.push({
        ruleId: rule.id,
        label: rule.label,
        line: index + 1,
        excerpt: toExcerpt(line),
      });
    }
  });

  return findings;
}
