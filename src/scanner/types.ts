export type PatternRule = {
  id: string;
  label: string;
  patterns: string[];
  description?: string;
  exclude_patterns?: string[];
};

export type Finding = {
  ruleId: string;
  label: string;
  line: number;
  excerpt: string;
};

export const MAX_EXCERPT_LENGTH = 60;
