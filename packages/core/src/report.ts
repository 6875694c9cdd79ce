import { rankForms, recommendationsFor, type AnalyticsSnapshot } from './analytics.js';
import type { GeneratedValue, TestRun } from './types.js';

function describeValue(value: GeneratedValue): string {
  if (!value.applicable) {
    return `n/a (${value.rationale})`;
  }
  const expectation = value.violation ? `${value.expectedOutcome}:${value.violation}` : value.expectedOutcome;
  return `${JSON.stringify(value.value)} ${expectation}${value.variant === 'primary' ? '' : ` ${value.variant}`}`;
}

export function valueLines(values: readonly GeneratedValue[]): string[] {
  return values.map((value) => `${value.fieldName.padEnd(16, ' ')} ${describeValue(value)}`);
}

export function runSummaryLines(run: TestRun): string[] {
  const lines = [
    `runId=${run.id} form=${run.metadataRef} scenario=${run.scenario} ` +
      `status=${run.status} durationMs=${run.durationMs ?? '-'}`
  ];
  for (const step of run.steps) {
    const status = step.status.toUpperCase().padEnd(17, ' ');
    lines.push(
      `${status} field=${step.fieldName} type=${step.semanticType} action=${step.action} (+${step.timestampOffset}ms)`
    );
    if (step.detail) {
      lines.push(`  detail=${step.detail}`);
    }
  }
  if (run.submission.clicked) {
    lines.push(`submission=${run.submission.outcome ?? 'pending'}`);
  }
  if (run.errorSummary) {
    lines.push(`error=${run.errorSummary}`);
  }
  for (const screenshot of run.screenshots) {
    lines.push(`screenshot[${screenshot.label}]=${screenshot.ref}`);
  }
  return lines;
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function metricsReportLines(snapshot: AnalyticsSnapshot): string[] {
  const lines = [
    `runs=${snapshot.totalRuns} passRate=${percent(snapshot.passRate)} ` +
      `meanDurationMs=${Math.round(snapshot.meanDurationMs)}`,
    `status passed=${snapshot.byStatus.passed} failed=${snapshot.byStatus.failed} ` +
      `errored=${snapshot.byStatus.errored} cancelled=${snapshot.byStatus.cancelled}`
  ];
  if (snapshot.minDurationMs !== null && snapshot.maxDurationMs !== null) {
    lines.push(`duration minMs=${snapshot.minDurationMs} maxMs=${snapshot.maxDurationMs}`);
  }
  for (const form of rankForms(snapshot)) {
    lines.push(`form ${form.formId} ${form.passed}/${form.total} passRate=${percent(form.passRate)}`);
  }
  for (const [scenario, stats] of Object.entries(snapshot.scenarios)) {
    if (stats.total > 0) {
      lines.push(`scenario ${scenario} ${stats.passed}/${stats.total}`);
    }
  }
  for (const [semanticType, stats] of Object.entries(snapshot.fieldTypes)) {
    lines.push(
      `fieldType ${semanticType} steps=${stats.steps} failures=${stats.failures} rate=${percent(stats.failureRate)}`
    );
  }
  const categories = Object.entries(snapshot.failureCategories).filter(([, count]) => count > 0);
  if (categories.length > 0) {
    lines.push(`failures ${categories.map(([category, count]) => `${category}=${count}`).join(' ')}`);
  }
  for (const failure of snapshot.recentFailures) {
    const summary = failure.errorSummary ? ` ${failure.errorSummary}` : '';
    lines.push(`recent ${failure.runId} ${failure.status} ${failure.category}${summary}`);
  }
  for (const recommendation of recommendationsFor(snapshot)) {
    lines.push(`- ${recommendation}`);
  }
  return lines;
}
