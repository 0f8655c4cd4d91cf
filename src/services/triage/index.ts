// Triage System Entry Point
// Tokenizes the symptom text, then applies the department rules

import type { RuleTable, TriageMatcher, TriageResult, TriageTrace } from './types.js';
import { tokenize } from './signals.js';
import { applyRules } from './rules.js';

export function explain(symptomText: string, table: RuleTable): TriageTrace {
  const start = performance.now();

  const tokens = tokenize(symptomText);
  const decision = applyRules(tokens, table);

  const elapsed_ms = Math.round(performance.now() - start);

  return {
    suggested_department: decision.department,
    confidence: decision.confidence,
    description: decision.description,
    matched_keywords: decision.matched,
    match_count: decision.matched.length,
    keyword_count: decision.keywordCount,
    elapsed_ms,
  };
}

export function analyze(symptomText: string, table: RuleTable): TriageResult {
  const { suggested_department, confidence, description } = explain(symptomText, table);
  return { suggested_department, confidence, description };
}

export function createTriageMatcher(table: RuleTable): TriageMatcher {
  return {
    table,
    analyze: (symptomText: string) => analyze(symptomText, table),
    explain: (symptomText: string) => explain(symptomText, table),
  };
}

export { loadRuleTable, parseRuleTable } from './table.js';

// Re-export types for convenience
export type { RuleEntry, RuleTable, TriageConfidence, TriageMatcher, TriageResult, TriageTrace } from './types.js';
