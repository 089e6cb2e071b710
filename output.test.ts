import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { PullRequestRecord, PullRequestState } from './types.js';
import { aggregatePullRequests } from './metrics.js';
import { displayRateLimit, formatReportText, saveSlackPayload } from './output.js';
import { createDateWindow } from './utils.js';

const WINDOW = createDateWindow(new Date('2024-01-01T00:00:00Z'), new Date('2024-03-31T00:00:00Z'));

function pr(id: number, author: string, repository: string, state: PullRequestState): PullRequestRecord {
  return { id, number: id, author, repository, createdAt: new Date('2024-02-01T12:00:00Z'), state };
}

// alice: 3 PRs, bob: 2 PRs across api and web
const RECORDS: PullRequestRecord[] = [
  pr(1, 'alice', 'api', 'merged'),
  pr(2, 'alice', 'api', 'open'),
  pr(3, 'alice', 'web', 'merged'),
  pr(4, 'bob', 'web', 'closed'),
  pr(5, 'bob', 'api', 'merged'),
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatReportText', () => {
  const report = aggregatePullRequests(WINDOW, RECORDS, ['api', 'web', 'docs']);
  const lines = formatReportText(report, 'acme').split('\n');

  it('starts with the organization, range and totals', () => {
    expect(lines.slice(0, 5)).toEqual([
      'Pull Request Statistics for acme (2024-01-01 to 2024-03-31)',
      '='.repeat(60),
      'Total pull requests: 5',
      'Contributors: 2',
      'Repositories with activity: 2 of 3',
    ]);
  });

  it('lists users busiest first with their state breakdown', () => {
    const header = lines.indexOf('Per user (sorted by total PRs):');

    expect(lines[header + 2]).toBe('Username'.padEnd(20) + '   Open   Merged   Closed   Total');
    expect(lines[header + 4].split(/\s+/)).toEqual(['alice', '1', '2', '0', '3']);
    expect(lines[header + 5].split(/\s+/)).toEqual(['bob', '0', '1', '1', '2']);
  });

  it('lists repositories', () => {
    const header = lines.indexOf('Per repository (sorted by total PRs):');

    expect(lines[header + 4].split(/\s+/)).toEqual(['api', '1', '2', '0', '3']);
    expect(lines[header + 5].split(/\s+/)).toEqual(['web', '0', '1', '1', '2']);
    expect(lines).toHaveLength(header + 6);
  });

  it('widens the name column for long names', () => {
    const long = 'a-very-long-username-here';
    const text = formatReportText(aggregatePullRequests(WINDOW, [pr(9, long, 'api', 'open')]), 'acme');
    const tableLines = text.split('\n');
    const header = tableLines.indexOf('Per user (sorted by total PRs):');

    expect(tableLines[header + 4].split(/\s+/)).toEqual([long, '1', '0', '0', '1']);
    expect(tableLines[header + 4]).toHaveLength(tableLines[header + 2].length);
  });

  it('reports no activity for an empty report', () => {
    const empty = aggregatePullRequests(WINDOW, []);

    expect(formatReportText(empty, 'acme')).toBe(
      'No pull request activity found for acme between 2024-01-01 and 2024-03-31.'
    );
  });
});

describe('saveSlackPayload', () => {
  it('writes the payload as JSON', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'org-pr-stats-'));
    const filepath = join(dir, 'slack_payload.json');

    try {
      const saved = await saveSlackPayload(filepath, { channel: 'C0TEST', text: 'hello' });

      expect(saved).toBe(filepath);
      expect(JSON.parse(await readFile(filepath, 'utf8'))).toEqual({ channel: 'C0TEST', text: 'hello' });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('displayRateLimit', () => {
  const now = new Date('2024-01-01T12:00:00Z');
  const resetAt = new Date('2024-01-01T12:30:00Z');

  it('prints the remaining quota', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    displayRateLimit({ limit: 5000, remaining: 4321, resetAt }, now);

    expect(log).toHaveBeenCalledWith('  Core API: 4321/5000 requests remaining');
  });

  it('warns when the quota is used up', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    displayRateLimit({ limit: 5000, remaining: 0, resetAt }, now);

    expect(log).toHaveBeenCalledWith(expect.stringContaining('❌ DEPLETED! Resets in 30 minutes'));
  });
});
