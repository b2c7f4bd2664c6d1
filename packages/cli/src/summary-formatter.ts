/**
 * Terminal summary of a harness run.
 */
import { formatSeconds } from '@tombcheck/core';
import type { ClusterStats, Report } from '@tombcheck/core';

function icon(passed: boolean): string {
  return passed ? '✓' : '✗'; // checkmark / X mark
}

/**
 * Format a report for the terminal.
 *
 * Example output:
 *   Result:    ✗ FAILED
 *   Duration:  84.2s
 *
 *   Preflight:
 *     nodes_running         ✓  3 node(s) up
 *
 *   Scenarios:
 *     single-node-restart      ✓  passed  (31.0s)
 *     partial-delete-failure   ✗  failed  (52.7s)  1 residual file(s) after recovery
 *
 *   Verification: 4/5
 *     tombstone_records     ✓  12 tombstone record(s), 3 auto-cleanup record(s)
 */
export function formatRunSummary(report: Report): string {
  const lines: string[] = [];

  lines.push(`Result:    ${icon(report.passed)} ${report.passed ? 'PASSED' : 'FAILED'}${report.aborted ? ' (aborted)' : ''}`);
  lines.push(`Duration:  ${formatSeconds(report.durationMs)}`);

  if (report.preflight) {
    lines.push('');
    lines.push('Preflight:');
    const width = Math.max(...report.preflight.checks.map((c) => c.name.length));
    for (const check of report.preflight.checks) {
      lines.push(`  ${check.name.padEnd(width + 2)}${icon(check.passed)}  ${check.detail}`);
    }
  }

  if (report.scenarios.length > 0) {
    lines.push('');
    lines.push('Scenarios:');
    const width = Math.max(...report.scenarios.map((s) => s.name.length));
    for (const scenario of report.scenarios) {
      const passed = scenario.status === 'passed';
      let line = `  ${scenario.name.padEnd(width + 3)}${icon(passed)}  ${scenario.status}  (${formatSeconds(scenario.durationMs)})`;
      if (scenario.failureReason) line += `  ${scenario.failureReason}`;
      lines.push(line);
    }
  }

  if (report.verification) {
    lines.push('');
    lines.push(`Verification: ${report.verification.passedCount}/${report.verification.total}`);
    const width = Math.max(...report.verification.checks.map((c) => c.name.length));
    for (const check of report.verification.checks) {
      lines.push(`  ${check.name.padEnd(width + 2)}${icon(check.passed)}  ${check.detail}`);
    }
  }

  return lines.join('\n');
}

/** Format coordinator counters as aligned `key: value` lines. */
export function formatStats(stats: ClusterStats): string {
  const keys = Object.keys(stats).sort();
  const width = Math.max(...keys.map((k) => k.length));
  return keys.map((key) => `${`${key}:`.padEnd(width + 2)}${String(stats[key])}`).join('\n');
}
