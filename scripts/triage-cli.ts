#!/usr/bin/env node
// Triage CLI - run the department matcher locally
// Usage: npm run triage -- "chest pain and palpitations"   (one-shot)
//        npm run triage                                    (interactive)

// Load environment variables from .env file
import 'dotenv/config';

import readline from 'readline';
import { env } from '../src/env.js';
import { createTriageMatcher, loadRuleTable, type TriageTrace } from '../src/services/triage/index.js';

const matcher = createTriageMatcher(loadRuleTable(env.TRIAGE_RULES_PATH));

function printTrace(trace: TriageTrace) {
  console.log('');
  console.log(`  Department:  ${trace.suggested_department}`);
  console.log(`  Confidence:  ${trace.confidence}`);
  console.log(`  Matched:     ${trace.matched_keywords.join(', ') || '-'} (${trace.match_count}/${trace.keyword_count})`);
  console.log(`  Description: ${trace.description}`);
  console.log('');
}

const oneShot = process.argv.slice(2).join(' ').trim();

if (oneShot) {
  printTrace(matcher.explain(oneShot));
} else {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log(`Loaded ${matcher.table.entries.length} departments from ${env.TRIAGE_RULES_PATH}`);
  console.log('Describe symptoms (empty line to quit).');
  rl.setPrompt('> ');
  rl.prompt();

  rl.on('line', line => {
    if (!line.trim()) {
      rl.close();
      return;
    }
    printTrace(matcher.explain(line));
    rl.prompt();
  });
}
