import type { Octokit } from '@octokit/rest';
import type { Config, ProgressLogger, PullRequestRecord } from './types.js';
import { loadConfig } from './config.js';
import { AuthError, EmptyOrgError, PrStatsError, RateLimitError } from './errors.js';
import { GitHubClient } from './github.js';
import { aggregatePullRequests } from './metrics.js';
import { displayRateLimit, formatReportText, saveSlackPayload } from './output.js';
import { buildErrorPayload, buildSlackPayload, postPayloadToSlack } from './slack.js';
import { formatWindow } from './utils.js';

export interface CliOptions {
  octokit?: Octokit;
  now?: Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function showRateLimit(client: GitHubClient): Promise<void> {
  try {
    displayRateLimit(await client.getRateLimit());
  } catch (error) {
    console.log(`  ⚠️  Could not fetch rate limit: ${errorMessage(error)}`);
  }
}

async function run(config: Config, octokit?: Octokit): Promise<void> {
  const log: ProgressLogger = config.quiet ? () => {} : message => console.log(message);

  log('🚀 GitHub Pull Request Statistics\n');
  log(`  Organization: ${config.organization}`);
  log(`  Date range: ${formatWindow(config.window)}`);

  const client = new GitHubClient(config, octokit);

  if (!config.quiet) {
    await showRateLimit(client);
    log('');
  }

  let repositories: string[] = [];
  let pullRequests: PullRequestRecord[] = [];

  try {
    ({ repositories, pullRequests } = await client.fetchAllPullRequests(config.window, log));
  } catch (error) {
    if (!(error instanceof EmptyOrgError)) throw error;
    log(`⚠️  ${error.message}; reporting zero activity.`);
  }

  const report = aggregatePullRequests(config.window, pullRequests, repositories);

  log('');
  console.log(formatReportText(report, config.organization));
  log('');

  const payload = buildSlackPayload(report, {
    organization: config.organization,
    period: config.period,
    channel: config.slackChannel,
  });

  if (config.payloadFile) {
    await saveSlackPayload(config.payloadFile, payload);
    log(`📄 Slack payload saved to: ${config.payloadFile}`);
  }

  if (config.slackBotToken && config.slackChannel) {
    log('📤 Posting report to Slack...');
    try {
      await postPayloadToSlack(config.slackBotToken, payload);
      log('✅ Successfully posted to Slack!');
    } catch (error) {
      console.error(`❌ Failed to post to Slack: ${errorMessage(error)}`);
    }
  }

  if (!config.quiet) {
    await showRateLimit(client);
  }
}

function reportError(error: unknown): void {
  console.error(`\n❌ Error: ${errorMessage(error)}`);

  if (error instanceof AuthError) {
    console.error('   Check that GITHUB_TOKEN is set and has the repo and read:org scopes.');
  } else if (error instanceof RateLimitError) {
    const reset = error.resetAt ? ` after ${error.resetAt.toLocaleTimeString()}` : '';
    console.error(`   Hit the GitHub API rate limit. Try again${reset}, or use a shorter date range.`);
  } else if (!(error instanceof PrStatsError) && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
}

/**
 * Run the whole report and return the process exit code
 */
export async function runCli(
  args: string[],
  env: Record<string, string | undefined>,
  options: CliOptions = {}
): Promise<number> {
  let config: Config;

  try {
    config = loadConfig(args, env, options.now);
  } catch (error) {
    reportError(error);
    return 1;
  }

  try {
    await run(config, options.octokit);
    return 0;
  } catch (error) {
    reportError(error);

    // Leave a payload behind so the chat step can still announce the failure
    if (config.payloadFile) {
      try {
        await saveSlackPayload(config.payloadFile, buildErrorPayload(errorMessage(error), config.slackChannel));
      } catch (writeError) {
        console.error(`❌ Could not write error payload: ${errorMessage(writeError)}`);
      }
    }

    return 1;
  }
}
