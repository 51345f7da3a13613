import type { NewIssueCandidate, OverallTrend, TopicChange } from '../types.js';

const GUIDANCE_MAGNITUDE = 0.4;

function pct(part: number, total: number): string {
  if (!total) return '0';
  return ((part / total) * 100).toFixed(0);
}

/**
 * Plain-language advice on whether and how to revise the assessment.
 */
export function describeUpdateGuidance(
  overallTrend: OverallTrend,
  newIssues: readonly NewIssueCandidate[],
): string[] {
  const guidance: string[] = [];

  if (overallTrend.overallDirection === 'expanding') {
    guidance.push('Coverage of material topics is growing; consider broadening the assessment scope.');
  } else if (overallTrend.overallDirection === 'contracting') {
    guidance.push('Coverage of material topics is shrinking; consider consolidating low-signal topics.');
  }

  if (newIssues.length > 0) {
    const keywords = newIssues.map((issue) => issue.keyword).join(', ');
    guidance.push(`Review newly surfaced issues for inclusion: ${keywords}.`);
  }

  if (overallTrend.meanChangeMagnitude > GUIDANCE_MAGNITUDE) {
    guidance.push('Priority shifts are large on average; re-rank topics rather than adjusting them one by one.');
  }

  const timing =
    overallTrend.updateNecessity === 'high'
      ? 'Update the materiality assessment now.'
      : overallTrend.updateNecessity === 'medium'
        ? 'Plan an assessment update within the next 3 months.'
        : 'No update needed yet; keep monitoring news coverage.';
  guidance.push(timing);

  return guidance;
}

/**
 * Multi-line digest of the run, used by the smoke script and tool output.
 */
export function summarizeChanges(changes: readonly TopicChange[], overallTrend: OverallTrend): string {
  if (!changes.length) {
    return 'No existing topics were analyzed.';
  }
  const total = changes.length;
  const { emerging, ongoing, maturing, declining } = overallTrend.changeDistribution;
  const series = [
    `${emerging} topics (${pct(emerging, total)}%) emerging`,
    `${ongoing} topics (${pct(ongoing, total)}%) ongoing`,
    `${maturing} topics (${pct(maturing, total)}%) maturing`,
    `${declining} topics (${pct(declining, total)}%) declining`,
  ];
  return `${overallTrend.summary}\n\nChange distribution:\n- ${series.join('\n- ')}`;
}
