/**
 * Format run records as clean markdown
 */

import { DIMENSION_ORDER, type ComparisonReport, type ComparisonResult, type RunRecord } from './types/index.js';

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

function signed(value: number): string {
  return `${value > 0 ? '+' : ''}${value.toFixed(1)}`;
}

function comparisonRow(result: ComparisonResult): string {
  switch (result.status) {
    case 'ADDED':
      return `| ${result.task} | - | ${pct(result.currentPercentage)} | - | - → ${result.currentGrade} | ADDED |`;
    case 'REMOVED':
      return `| ${result.task} | ${pct(result.baselinePercentage)} | - | - | ${result.baselineGrade} → - | REMOVED |`;
    default:
      return `| ${result.task} | ${pct(result.baselinePercentage)} | ${pct(result.currentPercentage)} | ${signed(result.delta)} | ${result.baselineGrade} → ${result.currentGrade} | ${result.status} |`;
  }
}

/**
 * One-line comparison summary, e.g. "vs run-1: 2 improved, 0 regressed, 1 unchanged (IMPROVED)"
 */
export function formatComparisonSummary(report: ComparisonReport): string {
  if (!report.baselineRunId) {
    return `No baseline comparison (${report.notice ?? 'no baseline'})`;
  }
  const s = report.summary;
  const extra = [s.added ? `${s.added} added` : '', s.removed ? `${s.removed} removed` : ''].filter(Boolean);
  return (
    `vs ${report.baselineRunId}: ${s.improved} improved, ${s.regressed} regressed, ${s.unchanged} unchanged` +
    (extra.length ? `, ${extra.join(', ')}` : '') +
    ` (${s.verdict})`
  );
}

export function formatComparison(report: ComparisonReport): string {
  const lines: string[] = [];
  lines.push(formatComparisonSummary(report));
  if (report.results.length === 0) {
    return lines.join('\n');
  }
  lines.push('');
  lines.push(`Changes smaller than ${report.epsilon} points count as unchanged.`);
  lines.push('');
  lines.push('| Task | Baseline | Current | Delta | Grade | Status |');
  lines.push('|------|----------|---------|-------|-------|--------|');
  for (const result of report.results) {
    lines.push(comparisonRow(result));
  }
  return lines.join('\n');
}

/**
 * Full run report (report.md)
 */
export function formatRunReport(record: RunRecord): string {
  const sections: string[] = [];
  const failed = record.failures.length;

  sections.push(`# Restyle Evaluation: ${record.runId}\n`);

  if (record.winner) {
    sections.push(`**Winner:** ${record.winner}\n`);
  }
  if (!record.complete) {
    sections.push(`> Incomplete run: ${failed} of ${record.pairs.length} evaluations failed.\n`);
  }

  // Final rankings
  sections.push('## Final Rankings\n');
  if (record.finalRankings.length > 0) {
    const w = record.config.synthesis;
    sections.push(`Weights: technical ${w.technical}, preference ${w.preference} (lower final score is better)\n`);
    sections.push('| Rank | Task | Technical | Preference | Final Score |');
    sections.push('|------|------|-----------|------------|-------------|');
    for (const entry of record.finalRankings) {
      sections.push(
        `| ${entry.rank} | ${entry.task} | ${entry.technicalRank} | ${entry.preferenceRank} | ${entry.finalScore.toFixed(2)} |`
      );
    }
  } else {
    sections.push('_No rankings._');
  }
  sections.push('');

  // Per-task scores
  sections.push('## Technical Scores\n');
  if (record.taskSummaries.length > 0) {
    const header = DIMENSION_ORDER.map(d => d[0].toUpperCase() + d.slice(1));
    sections.push(`| Task | Evaluations | Average | Grade | ${header.join(' | ')} |`);
    sections.push(`|------|-------------|---------|-------|${DIMENSION_ORDER.map(() => '---').join('|')}|`);
    for (const summary of record.taskSummaries) {
      const dims = DIMENSION_ORDER.map(d => summary.dimensionAverages[d]?.toFixed(2) ?? '-');
      sections.push(
        `| ${summary.task} | ${summary.evaluations} | ${pct(summary.avgPercentage)} | ${summary.avgGrade} | ${dims.join(' | ')} |`
      );
    }
  } else {
    sections.push('_No successful evaluations._');
  }
  sections.push('');

  // Preference judge reasoning
  if (record.preferenceRanking && record.preferenceRanking.rankings.length > 0) {
    sections.push(`## Preference Judge (${record.preferenceRanking.judgeModel})\n`);
    for (const item of record.preferenceRanking.rankings) {
      sections.push(`${item.rank}. **${item.task}** (appeal ${item.appealScore}/10): ${item.reasoning}`);
    }
    sections.push('');
  }

  if (failed > 0) {
    sections.push('## Failed Evaluations\n');
    for (const failure of record.failures) {
      sections.push(`- ${failure.pair.task} \`${failure.pair.transformedImage}\`: ${failure.code} ${failure.message}`);
    }
    sections.push('');
  }

  sections.push('## Comparison vs Baseline\n');
  sections.push(record.comparison ? formatComparison(record.comparison) : '_Not compared._');
  sections.push('');

  sections.push('## Metadata\n');
  sections.push(`- State: ${record.state}`);
  sections.push(`- Technical judge: ${record.judges.technical}`);
  sections.push(`- Preference judge: ${record.judges.preference}`);
  sections.push(`- Evaluations: ${record.evaluations.length} succeeded, ${failed} failed`);
  sections.push(`- Pipeline version: ${record.config.pipelineVersion}`);
  sections.push(`- Rubric version: ${record.config.rubricVersion}`);
  sections.push(`- Created: ${record.createdAt}`);
  if (record.persistedAt) {
    sections.push(`- Persisted: ${record.persistedAt}`);
  }

  return sections.join('\n') + '\n';
}

/**
 * Compact status for polling
 */
export function formatRunStatus(record: RunRecord): Record<string, unknown> {
  return {
    run_id: record.runId,
    state: record.state,
    complete: record.complete,
    pairs: record.pairs.length,
    evaluations_succeeded: record.evaluations.length,
    evaluations_failed: record.failures.length,
    failures: record.failures.map(f => ({ task: f.pair.task, image: f.pair.transformedImage, code: f.code, message: f.message })),
    winner: record.winner,
    verdict: record.comparison?.summary.verdict ?? null,
    last_error: record.lastError,
    updated_at: record.updatedAt,
  };
}
