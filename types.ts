export interface Config {
  githubToken: string;
  organization: string;
  window: DateWindow;
  quiet: boolean;
  payloadFile: string | null;
  period: string | null;
  slackChannel: string | null;
  slackBotToken: string | null;  // Only needed to post directly; the payload file works without it
}

export interface DateWindow {
  start: Date;
  end: Date;
}

export type PullRequestState = 'open' | 'merged' | 'closed';

export interface PullRequestRecord {
  readonly id: number;
  readonly number: number;
  readonly author: string;
  readonly repository: string;
  readonly createdAt: Date;
  readonly state: PullRequestState;
}

export interface PullRequestCounts {
  open: number;
  merged: number;
  closed: number;
  total: number;
}

export interface AggregateReport {
  readonly window: Readonly<DateWindow>;
  readonly totalPullRequests: number;
  readonly repositoriesScanned: number;
  readonly byAuthor: Readonly<Record<string, Readonly<PullRequestCounts>>>;
  readonly byRepository: Readonly<Record<string, Readonly<PullRequestCounts>>>;
}

export interface RankedEntry {
  name: string;
  counts: Readonly<PullRequestCounts>;
}

export interface CollectionResult {
  repositories: string[];
  pullRequests: PullRequestRecord[];
}

export interface RateLimitStatus {
  limit: number;
  remaining: number;
  resetAt: Date;
}

export type ProgressLogger = (message: string) => void;
