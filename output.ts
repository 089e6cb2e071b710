import { writeFile } from 'node:fs/promises';
import type { AggregateReport, RankedEntry, RateLimitStatus } from './types.js';
import type { SlackPayload } from './slack.js';
import { rankAuthors, rankRepositories } from './metrics.js';
import { formatDate, formatWindow } from './utils.js';

const RULE_WIDTH = 60;

function countsRow(label: string, width: number, entry: RankedEntry): string {
  const { open, merged, closed, total } = entry.counts;
  return [
    label.padEnd(width),
    open.toString().padStart(6),
    merged.toString().padStart(8),
    closed.toString().padStart(8),
    total.toString().padStart(7),
  ].join(' ');
}

function countsHeader(label: string, width: number): string {
  return [
    label.padEnd(width),
    'Open'.padStart(6),
    'Merged'.padStart(8),
    'Closed'.padStart(8),
    'Total'.padStart(7),
  ].join(' ');
}

function countsTable(title: string, label: string, entries: RankedEntry[]): string[] {
  const width = Math.max(20, label.length, ...entries.map(entry => entry.name.length));
  return [
    title,
    '-'.repeat(RULE_WIDTH),
    countsHeader(label, width),
    '-'.repeat(RULE_WIDTH),
    ...entries.map(entry => countsRow(entry.name, width, entry)),
  ];
}

/**
 * Render the report as a plain-text block
 */
export function formatReportText(report: AggregateReport, organization: string): string {
  const start = formatDate(report.window.start);
  const end = formatDate(report.window.end);

  if (report.totalPullRequests === 0) {
    return `No pull request activity found for ${organization} between ${start} and ${end}.`;
  }

  const authors = rankAuthors(report);
  const repositories = rankRepositories(report);

  const lines = [
    `Pull Request Statistics for ${organization} (${formatWindow(report.window)})`,
    '='.repeat(RULE_WIDTH),
    `Total pull requests: ${report.totalPullRequests}`,
    `Contributors: ${authors.length}`,
    `Repositories with activity: ${repositories.length} of ${report.repositoriesScanned}`,
    '',
    ...countsTable('Per user (sorted by total PRs):', 'Username', authors),
    '',
    ...countsTable('Per repository (sorted by total PRs):', 'Repository', repositories),
  ];

  return lines.join('\n');
}

/**
 * Save the chat payload for a separate posting step
 */
export async function saveSlackPayload(filepath: string, payload: SlackPayload): Promise<string> {
  await writeFile(filepath, JSON.stringify(payload, null, 2) + '\n', 'utf8');
  return filepath;
}

/**
 * Display API quota in console
 */
export function displayRateLimit(status: RateLimitStatus, now: Date = new Date()): void {
  const minutesUntilReset = Math.ceil((status.resetAt.getTime() - now.getTime()) / 60000);

  console.log('\n⚡ GitHub API Rate Limit Status:');
  console.log(`  Core API: ${status.remaining}/${status.limit} requests remaining`);
  if (status.remaining === 0) {
    console.log(`    ❌ DEPLETED! Resets in ${minutesUntilReset} minutes at ${status.resetAt.toLocaleTimeString()}`);
  } else if (status.remaining < 100) {
    console.log(`    ⚠️  Low! Resets in ${minutesUntilReset} minutes at ${status.resetAt.toLocaleTimeString()}`);
  } else {
    console.log(`    ✓ Resets at ${status.resetAt.toLocaleTimeString()}`);
  }
}
