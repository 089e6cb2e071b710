import type {
  AggregateReport,
  DateWindow,
  PullRequestCounts,
  PullRequestRecord,
  RankedEntry,
} from './types.js';
import { isWithinWindow } from './utils.js';

function emptyCounts(): PullRequestCounts {
  return { open: 0, merged: 0, closed: 0, total: 0 };
}

function tally(map: Map<string, PullRequestCounts>, key: string, pr: PullRequestRecord): void {
  let counts = map.get(key);
  if (!counts) {
    counts = emptyCounts();
    map.set(key, counts);
  }
  counts[pr.state]++;
  counts.total++;
}

// Sorted keys keep the report identical regardless of fetch order
function freezeCounts(map: Map<string, PullRequestCounts>): Readonly<Record<string, Readonly<PullRequestCounts>>> {
  const entries = [...map.entries()]
    .sort(([a], [b]) => compareNames(a, b))
    .map(([key, counts]) => [key, Object.freeze(counts)] as const);
  return Object.freeze(Object.fromEntries(entries));
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Tally pull requests created within the window per author and per repository
 */
export function aggregatePullRequests(
  window: DateWindow,
  pullRequests: readonly PullRequestRecord[],
  repositories: readonly string[] = []
): AggregateReport {
  const inWindow = pullRequests.filter(pr => isWithinWindow(pr.createdAt, window));

  const byAuthor = new Map<string, PullRequestCounts>();
  const byRepository = new Map<string, PullRequestCounts>();

  for (const pr of inWindow) {
    tally(byAuthor, pr.author, pr);
    tally(byRepository, pr.repository, pr);
  }

  const scanned = new Set([...repositories, ...pullRequests.map(pr => pr.repository)]);

  return Object.freeze({
    window: Object.freeze({ start: new Date(window.start), end: new Date(window.end) }),
    totalPullRequests: inWindow.length,
    repositoriesScanned: scanned.size,
    byAuthor: freezeCounts(byAuthor),
    byRepository: freezeCounts(byRepository),
  });
}

function rank(counts: AggregateReport['byAuthor']): RankedEntry[] {
  return Object.entries(counts)
    .map(([name, entry]) => ({ name, counts: entry }))
    .sort((a, b) => b.counts.total - a.counts.total || compareNames(a.name, b.name));
}

/**
 * Authors by total PRs, busiest first; ties go alphabetically
 */
export function rankAuthors(report: AggregateReport): RankedEntry[] {
  return rank(report.byAuthor);
}

export function rankRepositories(report: AggregateReport): RankedEntry[] {
  return rank(report.byRepository);
}
