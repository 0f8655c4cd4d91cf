// Rules Engine
// Score each department by matched keywords → produce the triage decision

import { detectKeywords } from './signals.js';
import type { RuleEntry, RuleTable, TriageConfidence } from './types.js';

export interface RuleDecision {
  department: string;
  confidence: TriageConfidence;
  description: string;
  matched: string[];
  keywordCount: number;
}

interface EntryScore {
  entry: RuleEntry;
  matched: string[];
}

const KEYWORDS_PLACEHOLDER = /\{keywords\}/g;

function scoreEntries(tokens: readonly string[], table: RuleTable): EntryScore[] {
  const tokenSet = new Set(tokens);
  return table.entries.map(entry => ({
    entry,
    matched: detectKeywords(tokens, tokenSet, entry.keywords),
  }));
}

// Strictly greater wins, so ties stay with the first-declared entry
function selectEntry(scores: EntryScore[]): EntryScore | null {
  let best: EntryScore | null = null;

  for (const score of scores) {
    if (score.matched.length === 0) continue;
    if (!best || score.matched.length > best.matched.length) {
      best = score;
    }
  }

  return best;
}

export function scoreConfidence(matchCount: number, keywordCount: number): TriageConfidence {
  if (matchCount <= 0 || keywordCount <= 0) return 'low';
  if (matchCount >= 2 || matchCount / keywordCount >= 0.5) return 'high';
  return 'medium';
}

function buildDescription(entry: RuleEntry, matched: string[]): string {
  const keywords = matched.join(', ');
  if (!entry.description) {
    return `Matched symptoms: ${keywords}.`;
  }
  return entry.description.replace(KEYWORDS_PLACEHOLDER, keywords);
}

export function applyRules(tokens: readonly string[], table: RuleTable): RuleDecision {
  if (tokens.length === 0) {
    return {
      department: table.defaultDepartment,
      confidence: 'none',
      description: table.defaultDescription,
      matched: [],
      keywordCount: 0,
    };
  }

  const winner = selectEntry(scoreEntries(tokens, table));

  if (!winner) {
    return {
      department: table.defaultDepartment,
      confidence: 'low',
      description: table.defaultDescription,
      matched: [],
      keywordCount: 0,
    };
  }

  return {
    department: winner.entry.department,
    confidence: scoreConfidence(winner.matched.length, winner.entry.keywords.length),
    description: buildDescription(winner.entry, winner.matched),
    matched: winner.matched,
    keywordCount: winner.entry.keywords.length,
  };
}
