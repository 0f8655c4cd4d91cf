// Triage System Types
// Symptom text → suggested department via a static keyword table

export type TriageConfidence =
  | 'high'    // Half the department's keywords (or two distinct ones) matched
  | 'medium'  // A single keyword matched
  | 'low'     // Text present but nothing matched
  | 'none';   // No usable text at all

export interface RuleEntry {
  department: string;
  keywords: readonly string[]; // Normalized; may contain multi-word phrases
  description?: string;        // Template, `{keywords}` is substituted
}

export interface RuleTable {
  defaultDepartment: string;
  defaultDescription: string;
  entries: readonly RuleEntry[]; // Declaration order is tie-break priority
}

export interface TriageResult {
  suggested_department: string;
  confidence: TriageConfidence;
  description: string;
}

export interface TriageTrace extends TriageResult {
  matched_keywords: string[];
  match_count: number;
  keyword_count: number;
  elapsed_ms: number;
}

export interface TriageMatcher {
  analyze(symptomText: string): TriageResult;
  explain(symptomText: string): TriageTrace;
  readonly table: RuleTable;
}
