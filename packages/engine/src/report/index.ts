/**
 * Report rendering for harness summaries
 */

import { decimalTolerance } from '@columnwave/shared';
import type { ValidationReport } from '../api/index.js';
import type { CaseOutcome, HarnessSummary } from '../harness/index.js';

/** One table row: a single verdict, or a case that failed before comparison */
export interface ReportRow {
  caseName: string;
  kind: CaseOutcome['kind'];
  check: string;
  expected: string;
  observed: string;
  tolerance: string;
  passed: boolean;
}

function formatValue(value: number): string {
  return value.toFixed(5);
}

/**
 * Rows for one validation report
 */
export function reportRows(report: ValidationReport): ReportRow[] {
  return report.verdicts.map((v) => ({
    caseName: report.caseName,
    kind: report.kind,
    check: v.label,
    expected: formatValue(v.expected),
    observed: formatValue(v.observed),
    tolerance: `±${decimalTolerance(v.decimalPlaces)}`,
    passed: v.passed,
  }));
}

function outcomeRows(outcome: CaseOutcome): ReportRow[] {
  if (outcome.report) return reportRows(outcome.report);
  return [
    {
      caseName: outcome.name,
      kind: outcome.kind,
      check: outcome.error?.code ?? 'UNEXPECTED_ERROR',
      expected: '',
      observed: outcome.error?.message.split('\n')[0] ?? '',
      tolerance: '',
      passed: false,
    },
  ];
}

/**
 * Markdown table of every verdict plus warnings and a summary line
 */
export function formatMarkdownReport(summary: HarnessSummary, generatedAt: Date = new Date()): string {
  const lines = [
    `# ${summary.name}`,
    `Generated: ${generatedAt.toISOString()}`,
    '',
    '| Case | Kind | Check | Expected | Observed | Tolerance | Status |',
    '|------|------|-------|----------|----------|-----------|--------|',
  ];

  for (const r of summary.outcomes.flatMap(outcomeRows)) {
    const status = r.passed ? '✅' : '❌';
    lines.push(
      `| ${r.caseName} | ${r.kind} | ${r.check} | ${r.expected} | ${r.observed} | ${r.tolerance} | ${status} |`
    );
  }

  const warnings = summary.outcomes.flatMap((o) =>
    (o.report?.warnings ?? []).map((w) => `- ${o.name}: [${w.code}] ${w.message}`)
  );
  if (warnings.length > 0) {
    lines.push('', '## Warnings', ...warnings);
  }

  lines.push('', `**Summary:** ${summary.passed}/${summary.outcomes.length} cases passed`);
  return lines.join('\n');
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * CSV export of every verdict
 */
export function formatCsvReport(summary: HarnessSummary): string {
  const header = 'Case,Kind,Check,Expected,Observed,Tolerance,Passed';
  const rows = summary.outcomes
    .flatMap(outcomeRows)
    .map((r) =>
      [r.caseName, r.kind, r.check, r.expected, r.observed, r.tolerance, r.passed ? 'PASS' : 'FAIL']
        .map(csvField)
        .join(',')
    );
  return [header, ...rows].join('\n');
}
