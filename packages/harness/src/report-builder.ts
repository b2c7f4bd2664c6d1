import { z } from 'zod';
import { formatSeconds, OrphanFileSchema } from '@tombcheck/core';
import type {
  CheckResult,
  DeleteOutcome,
  OrphanFile,
  PreflightResult,
  Report,
  ScenarioExpectation,
  ScenarioResult,
  VerificationSummary,
} from '@tombcheck/core';

export const REPORT_TITLE = 'Tombstone Mechanism Verification Report';

/** Longest delete response shown in the Markdown table. */
export const RESPONSE_PREVIEW_LENGTH = 50;

export interface ReportInput {
  coordinatorUrl: string;
  startedAt: Date;
  endedAt: Date;
  generatedAt: Date;
  preflight?: PreflightResult;
  scenarios: readonly ScenarioResult[];
  verification?: VerificationSummary;
  aborted: boolean;
  title?: string;
}

/**
 * Expected protocol behaviour per scenario. Reported next to the verdict;
 * only `status_passed` feeds into the scenario status itself.
 */
export function scenarioExpectations(result: ScenarioResult): ScenarioExpectation[] {
  const entries: Array<Omit<ScenarioExpectation, 'scenario' | 'met'>> = [
    { name: 'status_passed', expected: true, observed: result.status === 'passed' },
    { name: 'tombstone_created', expected: true, observed: result.tombstoneCreated },
    { name: 'auto_cleanup', expected: true, observed: result.autoCleanup },
  ];
  if (result.expectDeleteFailure) {
    const rejected = result.deleteOutcomes.some((outcome) => outcome.status !== 200);
    entries.push({ name: 'delete_rejected', expected: true, observed: rejected });
  }
  if (result.partialFailureDetected !== null) {
    entries.push({ name: 'partial_failure_detected', expected: true, observed: result.partialFailureDetected });
  }
  return entries.map((entry) => ({
    scenario: result.name,
    ...entry,
    met: entry.observed === entry.expected,
  }));
}

/** Assemble the final report. Pure: every timestamp comes from `input`. */
export function buildReport(input: ReportInput): Report {
  const preflightPassed = input.preflight?.passed ?? true;
  const scenariosPassed = input.scenarios.every((scenario) => scenario.status === 'passed');
  const checksPassed = input.verification?.passed ?? false;

  const report: Report = {
    title: input.title ?? REPORT_TITLE,
    generatedAt: input.generatedAt.toISOString(),
    startedAt: input.startedAt.toISOString(),
    endedAt: input.endedAt.toISOString(),
    durationMs: Math.max(0, input.endedAt.getTime() - input.startedAt.getTime()),
    coordinatorUrl: input.coordinatorUrl,
    scenarios: [...input.scenarios],
    expectations: input.scenarios.flatMap(scenarioExpectations),
    aborted: input.aborted,
    passed: preflightPassed && scenariosPassed && checksPassed && !input.aborted,
  };
  if (input.preflight) report.preflight = input.preflight;
  if (input.verification) report.verification = input.verification;
  return report;
}

/** Machine-readable form of the report. */
export function renderJson(report: Report): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

// --- Markdown ---

/** Make arbitrary text safe inside a Markdown table cell. */
export function escapeCell(text: string): string {
  return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

function mark(value: boolean): string {
  return value ? '✅' : '❌';
}

function flag(value: boolean | null): string {
  if (value === null) return 'n/a';
  return value ? '✅ yes' : '❌ no';
}

function statusCell(outcome: DeleteOutcome): string {
  return outcome.status === -1 ? 'error' : String(outcome.status);
}

function checkTable(checks: readonly CheckResult[]): string[] {
  const lines = ['| Check | Result | Detail |', '|---|---|---|'];
  for (const check of checks) {
    lines.push(`| ${escapeCell(check.name)} | ${mark(check.passed)} | ${escapeCell(check.detail)} |`);
  }
  return lines;
}

function orphansFrom(summary: VerificationSummary): OrphanFile[] {
  const check = summary.checks.find((c) => c.name === 'no_orphan_files');
  const parsed = z.array(OrphanFileSchema).safeParse(check?.payload?.['orphans']);
  return parsed.success ? parsed.data : [];
}

function renderScenario(result: ScenarioResult, index: number): string[] {
  const lines: string[] = [];
  lines.push(`## ${index + 1}. ${result.title} (\`${result.name}\`)`);
  lines.push('');
  lines.push(`- **Status:** ${result.status === 'passed' ? '✅ passed' : '❌ failed'}${result.aborted ? ' (aborted)' : ''}`);
  if (result.failureReason) {
    lines.push(`- **Failure reason:** ${result.failureReason}`);
  }
  lines.push(`- **Stopped nodes:** ${result.faultNodes.join(', ')}`);
  lines.push(`- **Target files:** ${result.targetFiles.length}`);
  if (result.expectDeleteFailure) {
    const rejected = result.deleteOutcomes.filter((outcome) => outcome.status !== 200).length;
    lines.push(`- **Rejected deletes:** ${rejected} of ${result.deleteOutcomes.length}`);
  }
  lines.push(`- **Tombstone created:** ${flag(result.tombstoneCreated)}`);
  lines.push(`- **Partial delete failure logged:** ${flag(result.partialFailureDetected)}`);
  lines.push(`- **Auto cleanup:** ${flag(result.autoCleanup)} (${result.cleanupEvents.length} event(s))`);
  lines.push(`- **Residue free:** ${flag(result.residueFree)}`);
  lines.push(`- **Duration:** ${formatSeconds(result.durationMs)}`);
  if (result.baselineStats && result.finalStats) {
    lines.push(
      `- **Indexed files:** ${result.baselineStats.total_files} → ${result.finalStats.total_files}`,
    );
  }
  lines.push('');

  lines.push('### Delete requests');
  lines.push('');
  if (result.deleteOutcomes.length === 0) {
    lines.push('_No delete requests issued._');
  } else {
    lines.push('| File | Status | Response |');
    lines.push('|---|---|---|');
    for (const outcome of result.deleteOutcomes) {
      const response = truncate(outcome.response ?? outcome.error ?? '', RESPONSE_PREVIEW_LENGTH);
      lines.push(`| ${escapeCell(outcome.file)} | ${statusCell(outcome)} | ${escapeCell(response)} |`);
    }
  }
  lines.push('');

  lines.push('### Residual files');
  lines.push('');
  if (result.residue.length === 0) {
    lines.push('None.');
  } else {
    for (const orphan of result.residue) {
      lines.push(`- \`${orphan.node}\`: ${orphan.file}`);
    }
  }
  lines.push('');
  return lines;
}

function conclusion(report: Report): string {
  if (report.aborted) {
    return 'The run was interrupted before it finished; results are partial.';
  }
  if (report.preflight && !report.preflight.passed) {
    return 'The environment did not pass preflight checks; no scenario was executed.';
  }
  if (report.passed) {
    return 'Tombstones were recorded for deletes against a degraded cluster and every leftover replica was cleaned after the stopped nodes rejoined.';
  }
  return 'The tombstone mechanism did not converge as expected; see the failed scenarios and checks above.';
}

/** Human-readable form of the report. */
export function renderMarkdown(report: Report): string {
  const lines: string[] = [];

  lines.push(`# ${report.title}`);
  lines.push('');
  lines.push(`- **Generated:** ${report.generatedAt}`);
  lines.push(`- **Started:** ${report.startedAt}`);
  lines.push(`- **Finished:** ${report.endedAt}`);
  lines.push(`- **Duration:** ${formatSeconds(report.durationMs)}`);
  lines.push(`- **Coordinator:** ${report.coordinatorUrl}`);
  lines.push(`- **Result:** ${report.passed ? '✅ PASSED' : '❌ FAILED'}${report.aborted ? ' (aborted)' : ''}`);
  lines.push('');

  lines.push('## Preflight');
  lines.push('');
  if (report.preflight) {
    lines.push(...checkTable(report.preflight.checks));
  } else {
    lines.push('_Skipped._');
  }
  lines.push('');

  report.scenarios.forEach((scenario, index) => {
    lines.push(...renderScenario(scenario, index));
  });

  if (report.expectations.length > 0) {
    lines.push('## Expectations');
    lines.push('');
    lines.push('| Scenario | Expectation | Expected | Observed | Met |');
    lines.push('|---|---|---|---|---|');
    for (const exp of report.expectations) {
      lines.push(
        `| ${escapeCell(exp.scenario)} | ${escapeCell(exp.name)} | ${String(exp.expected)} | ${
          exp.observed === null ? 'n/a' : String(exp.observed)
        } | ${mark(exp.met)} |`,
      );
    }
    lines.push('');
  }

  lines.push('## Verification');
  lines.push('');
  if (report.verification) {
    lines.push(`Passed ${report.verification.passedCount}/${report.verification.total} checks.`);
    lines.push('');
    lines.push(...checkTable(report.verification.checks));
    const orphans = orphansFrom(report.verification);
    if (orphans.length > 0) {
      lines.push('');
      lines.push('### Orphan files');
      lines.push('');
      for (const orphan of orphans) {
        lines.push(`- \`${orphan.node}\`: ${orphan.file}`);
      }
    }
  } else {
    lines.push('_Not run._');
  }
  lines.push('');

  lines.push('## Conclusion');
  lines.push('');
  lines.push(conclusion(report));
  lines.push('');

  return lines.join('\n');
}
