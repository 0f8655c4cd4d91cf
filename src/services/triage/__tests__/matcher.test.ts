import { describe, it, expect } from 'vitest';
import { analyze, createTriageMatcher, explain, loadRuleTable, parseRuleTable } from '../index.js';
import { scoreConfidence } from '../rules.js';

const table = loadRuleTable();
const matcher = createTriageMatcher(table);

const DEFAULT_DESCRIPTION =
  'Based on your symptoms, we recommend starting with a general medicine consultation for initial evaluation and potential referral to a specialist if needed.';

describe('Triage Matcher', () => {
  describe('analyze', () => {
    it('should route headache and dizziness to Neurology with high confidence', () => {
      expect(matcher.analyze('fever headache dizziness')).toEqual({
        suggested_department: 'Neurology',
        confidence: 'high',
        description:
          'Your symptoms (headache, dizziness) suggest a neurological concern. A neurologist can help diagnose and treat conditions related to the nervous system.',
      });
    });

    it('should match multi-word keywords regardless of case and punctuation', () => {
      expect(matcher.analyze('I have CHEST PAIN!!')).toEqual({
        suggested_department: 'Cardiology',
        confidence: 'medium',
        description:
          'Based on your description of chest pain, we recommend consultation with a cardiologist for proper evaluation.',
      });
    });

    it('should treat hyphenated phrases as separate words', () => {
      const result = matcher.analyze('Constant back-pain since Monday');
      expect(result.suggested_department).toBe('Orthopedics');
      expect(result.description).toBe(
        'Based on your musculoskeletal symptoms (back pain), an orthopedic specialist would be most appropriate for evaluation and treatment.',
      );
    });

    it('should require phrase words to be adjacent and in order', () => {
      const result = matcher.analyze('pain in my back');
      expect(result.suggested_department).toBe('General Medicine');
      expect(result.confidence).toBe('low');
    });

    it('should not match keywords inside longer words', () => {
      const result = matcher.analyze('early morning tiredness');
      expect(result).toEqual({
        suggested_department: 'General Medicine',
        confidence: 'low',
        description: DEFAULT_DESCRIPTION,
      });
    });

    it('should fill the ENT description with the matched keywords', () => {
      expect(matcher.analyze('sharp pain in my ear')).toEqual({
        suggested_department: 'ENT (Ear, Nose, Throat)',
        confidence: 'medium',
        description: 'Based on your ENT-related symptoms (ear), consultation with an ENT specialist is recommended.',
      });
    });

    it('should give every bundled department its own description', () => {
      for (const entry of table.entries) {
        expect(entry.description).toBeDefined();
      }
    });

    it('should count a repeated keyword once', () => {
      const trace = matcher.explain('rash rash rash');
      expect(trace.suggested_department).toBe('Dermatology');
      expect(trace.match_count).toBe(1);
      expect(trace.confidence).toBe('medium');
    });

    it('should return confidence none for empty input', () => {
      expect(matcher.analyze('')).toEqual({
        suggested_department: 'General Medicine',
        confidence: 'none',
        description: DEFAULT_DESCRIPTION,
      });
    });

    it('should return confidence none for punctuation-only input', () => {
      expect(matcher.analyze('  ?!... ,,, ').confidence).toBe('none');
    });

    it('should be case-insensitive', () => {
      expect(matcher.analyze('FEVER')).toEqual(matcher.analyze('fever'));
      expect(matcher.analyze('HEADACHE')).toEqual(matcher.analyze('headache'));
    });

    it('should return the same result on repeated calls', () => {
      const text = 'Stomach ache, nausea and a skin rash';
      const first = matcher.analyze(text);
      for (let i = 0; i < 5; i++) {
        expect(matcher.analyze(text)).toEqual(first);
      }
      expect(first.suggested_department).toBe('Gastroenterology');
      expect(first.confidence).toBe('high');
    });

    it('should route text made only of one department keywords to that department', () => {
      for (const entry of table.entries) {
        const result = matcher.analyze(entry.keywords.join(' '));
        expect(result.suggested_department).toBe(entry.department);
        expect(result.confidence).toBe('high');
      }
    });

    it('should break ties in favour of the first-declared department', () => {
      // Cardiology is declared before Neurology
      const result = matcher.analyze('heart racing and a headache');
      expect(result.suggested_department).toBe('Cardiology');
      expect(result.confidence).toBe('medium');
    });

    it('should prefer the department with more matches over declaration order', () => {
      const result = matcher.analyze('heart racing, headache and numbness');
      expect(result.suggested_department).toBe('Neurology');
    });
  });

  describe('custom rule tables', () => {
    const custom = parseRuleTable({
      defaultDepartment: 'Triage Desk',
      defaultDescription: 'Please see the triage desk.',
      entries: [
        { department: 'Respiratory', keywords: ['cough', 'wheeze'], description: 'Breathing: {keywords}.' },
        { department: 'Allergy', keywords: ['cough', 'sneeze', 'hives', 'pollen'] },
      ],
    });

    it('should resolve identical matches to the first entry', () => {
      expect(analyze('cough', custom).suggested_department).toBe('Respiratory');
    });

    it('should rate a single match covering half the keywords as high', () => {
      expect(analyze('cough', custom)).toEqual({
        suggested_department: 'Respiratory',
        confidence: 'high',
        description: 'Breathing: cough.',
      });
    });

    it('should let a later entry win with more matches', () => {
      expect(analyze('cough, sneeze and hives', custom)).toEqual({
        suggested_department: 'Allergy',
        confidence: 'high',
        description: 'Matched symptoms: cough, sneeze, hives.',
      });
    });

    it('should fall back to a generated description when the entry has no template', () => {
      expect(analyze('pollen season again', custom)).toEqual({
        suggested_department: 'Allergy',
        confidence: 'medium',
        description: 'Matched symptoms: pollen.',
      });
    });

    it('should match accented keywords in composed and decomposed form', () => {
      const accented = parseRuleTable({
        defaultDepartment: 'Médecine générale',
        defaultDescription: 'Consultez un généraliste.',
        entries: [{ department: 'Neurologie', keywords: ['mal de tête', 'migraine'] }],
      });
      const composed = analyze('mal de t\u00eate', accented);
      const decomposed = analyze('mal de te\u0302te', accented);

      expect(composed.suggested_department).toBe('Neurologie');
      expect(composed.confidence).toBe('high');
      expect(decomposed).toEqual(composed);
    });

    it('should use the table defaults when nothing matches', () => {
      expect(analyze('sore knee', custom)).toEqual({
        suggested_department: 'Triage Desk',
        confidence: 'low',
        description: 'Please see the triage desk.',
      });
    });
  });

  describe('explain', () => {
    it('should report matched keywords and counts', () => {
      const trace = explain('Blurred vision and itchy eyes', table);
      expect(trace.suggested_department).toBe('Ophthalmology');
      expect(trace.matched_keywords).toEqual(['eyes', 'vision']);
      expect(trace.match_count).toBe(2);
      expect(trace.keyword_count).toBe(5);
      expect(trace.elapsed_ms).toBeGreaterThanOrEqual(0);
    });

    it('should report zero counts for the default department', () => {
      const trace = explain('', table);
      expect(trace.matched_keywords).toEqual([]);
      expect(trace.match_count).toBe(0);
      expect(trace.keyword_count).toBe(0);
    });
  });

  describe('scoreConfidence', () => {
    it('should map match ratios to confidence labels', () => {
      expect(scoreConfidence(0, 5)).toBe('low');
      expect(scoreConfidence(1, 5)).toBe('medium');
      expect(scoreConfidence(1, 2)).toBe('high');
      expect(scoreConfidence(2, 6)).toBe('high');
    });
  });
});
