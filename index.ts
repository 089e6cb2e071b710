#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './cli.js';

// Show help message
if (process.argv.includes('--help') || process.argv.includes('-h')) {
  console.log(`
GitHub Pull Request Statistics

Usage:
  org-pr-stats [organization] [options]

Options:
  --days N                   Look back N days from today (default: 90)
  --start-date YYYY-MM-DD    Start date for analysis
  --end-date YYYY-MM-DD      End date for analysis (default: today; needs --start-date)
  --last-month               Analyze the previous calendar month
  --quiet, -q                Print only the statistics
  --payload-file PATH        Write a Slack message payload (JSON) to PATH
  --channel ID               Slack channel for the payload (default: SLACK_CHANNEL_ID)
  --period LABEL             Period shown in the Slack header (default: the date range)
  --help, -h                 Show this help message

Environment:
  GITHUB_TOKEN      Token with 'repo' and 'read:org' scopes (required)
  DEFAULT_ORG       Organization used when none is given
  SLACK_BOT_TOKEN   Post the payload with chat.postMessage when a channel is set
  SLACK_CHANNEL_ID  Slack channel for the payload
  PERIOD            Same as --period

Examples:
  org-pr-stats my-org
  org-pr-stats my-org --days 30
  org-pr-stats my-org --start-date 2024-01-01 --end-date 2024-03-31
  org-pr-stats --last-month --quiet --payload-file slack_payload.json > stats_output.txt

  Get a GitHub token from: https://github.com/settings/tokens
`);
  process.exit(0);
}

process.exit(await runCli(process.argv.slice(2), process.env));
