// Rule table loading
// Read once at startup, validated, then shared read-only by every matcher call

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { AppError } from '../../utils/errors.js';
import { normalizeKeyword } from './signals.js';
import type { RuleEntry, RuleTable } from './types.js';

const DEFAULT_RULES_PATH = 'config/departments.json';

const RuleEntrySchema = z.object({
  department: z.string().trim().min(1),
  keywords: z.array(z.string()).min(1),
  description: z.string().trim().min(1).optional(),
});

const RuleTableSchema = z.object({
  defaultDepartment: z.string().trim().min(1),
  defaultDescription: z.string().trim().min(1),
  entries: z.array(RuleEntrySchema).min(1),
});

function normalizeKeywords(department: string, keywords: string[]): readonly string[] {
  const unique = new Set<string>();
  for (const keyword of keywords) {
    const normalized = normalizeKeyword(keyword);
    if (normalized) unique.add(normalized);
  }

  if (unique.size === 0) {
    throw AppError.validationError(`Rule entry "${department}" has no usable keywords`);
  }

  return Object.freeze(Array.from(unique));
}

export function parseRuleTable(raw: unknown): RuleTable {
  const parsed = RuleTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.validationError('Invalid triage rule table', parsed.error.issues);
  }

  const seen = new Set<string>();
  const entries: RuleEntry[] = [];

  for (const entry of parsed.data.entries) {
    const key = entry.department.toLowerCase();
    if (seen.has(key)) {
      throw AppError.validationError(`Duplicate department "${entry.department}" in triage rule table`);
    }
    seen.add(key);

    const rule: RuleEntry = {
      department: entry.department,
      keywords: normalizeKeywords(entry.department, entry.keywords),
      ...(entry.description ? { description: entry.description } : {}),
    };
    entries.push(Object.freeze(rule));
  }

  return Object.freeze({
    defaultDepartment: parsed.data.defaultDepartment,
    defaultDescription: parsed.data.defaultDescription,
    entries: Object.freeze(entries),
  });
}

export function loadRuleTable(filePath: string = DEFAULT_RULES_PATH): RuleTable {
  const resolved = path.resolve(process.cwd(), filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw AppError.validationError(`Cannot read triage rule table at ${resolved}: ${reason}`);
  }

  return parseRuleTable(raw);
}
