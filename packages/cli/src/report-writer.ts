import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { renderJson, renderMarkdown } from '@tombcheck/harness';
import type { Report } from '@tombcheck/core';

export interface WrittenReport {
  markdownPath: string;
  jsonPath: string;
}

/**
 * File-name stamp derived from the report's generation time (UTC),
 * e.g. "2026-10-18T09:05:03.120Z" → "20261018_090503".
 */
export function reportStamp(generatedAt: string): string {
  const date = new Date(generatedAt);
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** Write the Markdown report and the JSON results into `outputDir`. */
export async function writeReport(report: Report, outputDir: string): Promise<WrittenReport> {
  await mkdir(outputDir, { recursive: true });
  const stamp = reportStamp(report.generatedAt);
  const markdownPath = join(outputDir, `tombstone-report-${stamp}.md`);
  const jsonPath = join(outputDir, `tombstone-results-${stamp}.json`);
  await writeFile(markdownPath, renderMarkdown(report), 'utf-8');
  await writeFile(jsonPath, renderJson(report), 'utf-8');
  return { markdownPath, jsonPath };
}
