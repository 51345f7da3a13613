#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { getConfig } from '../config.js';
import { AssessMaterialitySchema } from '../schemas/materiality.js';
import { createAnalysisDependencies, runMaterialityAnalysis } from '../services/analysis.js';
import { summarizeChanges } from '../services/summaries.js';

async function main() {
  const path = resolve(process.argv[2] ?? 'fixtures/sample-run.json');
  console.log('[SMOKE] Reading run fixture:', path);

  const parsed = AssessMaterialitySchema.safeParse(JSON.parse(readFileSync(path, 'utf8')));
  if (!parsed.success) {
    console.error('[SMOKE] Fixture is invalid:', parsed.error.issues[0]?.message ?? 'unknown issue');
    process.exit(1);
  }
  const { companyName, topics, articles = [] } = parsed.data;

  const deps = createAnalysisDependencies(getConfig());
  const report = runMaterialityAnalysis({ companyName, topics, articles }, deps);

  console.log('[SMOKE] Articles:', report.articleSummary);
  console.log('[SMOKE]', summarizeChanges(report.topicChanges, report.overallTrend));
  console.log('[SMOKE] New issues:', report.newIssues.map((issue) => issue.keyword));
  console.log(
    '[SMOKE] Recommendations:',
    report.recommendations.map((rec) => `${rec.subject} -> ${rec.action}`),
  );
  console.log('[SMOKE] Guidance:', report.guidance);
}

main().catch((e: unknown) => {
  console.error('[SMOKE] Uncaught error:', e instanceof Error ? e.message : String(e));
  process.exit(1);
});
