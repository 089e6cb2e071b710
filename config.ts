import type { Config, DateWindow } from './types.js';
import { AuthError, ConfigError } from './errors.js';
import { createDateWindow, lastDaysWindow, parseDateArg, previousMonthWindow } from './utils.js';

export const DEFAULT_WINDOW_DAYS = 90;

type Env = Record<string, string | undefined>;

interface ParsedArgs {
  organization: string | null;
  days: number | null;
  startDate: Date | null;
  endDate: Date | null;
  lastMonth: boolean;
  quiet: boolean;
  payloadFile: string | null;
  channel: string | null;
  period: string | null;
}

const VALUE_FLAGS = new Set([
  '--days',
  '--start-date',
  '--end-date',
  '--payload-file',
  '--channel',
  '--period',
]);

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    organization: null,
    days: null,
    startDate: null,
    endDate: null,
    lastMonth: false,
    quiet: false,
    payloadFile: null,
    channel: null,
    period: null,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`${arg} requires a value`);
      }
      i++;

      switch (arg) {
        case '--days':
          parsed.days = parseDays(value);
          break;
        case '--start-date':
          parsed.startDate = parseDateArg(value, arg);
          break;
        case '--end-date':
          parsed.endDate = parseDateArg(value, arg);
          break;
        case '--payload-file':
          parsed.payloadFile = value;
          break;
        case '--channel':
          parsed.channel = value;
          break;
        case '--period':
          parsed.period = value;
          break;
      }
    } else if (arg === '--last-month') {
      parsed.lastMonth = true;
    } else if (arg === '--quiet' || arg === '-q') {
      parsed.quiet = true;
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else if (parsed.organization === null) {
      parsed.organization = arg;
    } else {
      throw new ConfigError(`Unexpected argument: ${arg}`);
    }
  }

  return parsed;
}

function parseDays(value: string): number {
  const days = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(days)) {
    throw new ConfigError(`--days must be a non-negative whole number, got "${value}"`);
  }
  return days;
}

function resolveWindow(args: ParsedArgs, now: Date): DateWindow {
  const selected = [args.days !== null, args.startDate !== null, args.lastMonth].filter(Boolean);
  if (selected.length > 1) {
    throw new ConfigError('Use only one of --days, --start-date or --last-month');
  }

  if (args.endDate !== null && args.startDate === null) {
    throw new ConfigError('--end-date requires --start-date');
  }

  if (args.startDate !== null) {
    return createDateWindow(args.startDate, args.endDate ?? now);
  }
  if (args.lastMonth) {
    return previousMonthWindow(now);
  }
  return lastDaysWindow(args.days ?? DEFAULT_WINDOW_DAYS, now);
}

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Build the run configuration from CLI arguments and environment
 */
export function loadConfig(args: string[], env: Env, now: Date = new Date()): Config {
  const parsed = parseArgs(args);

  const organization = nonEmpty(parsed.organization) ?? nonEmpty(env.DEFAULT_ORG);
  if (!organization) {
    throw new ConfigError(
      'No organization given. Pass it as the first argument or set DEFAULT_ORG.'
    );
  }

  const githubToken = nonEmpty(env.GITHUB_TOKEN) ?? nonEmpty(env.GH_TOKEN);
  if (!githubToken) {
    throw new AuthError('GitHub token not found. Set the GITHUB_TOKEN environment variable.');
  }

  return {
    githubToken,
    organization,
    window: resolveWindow(parsed, now),
    quiet: parsed.quiet,
    payloadFile: parsed.payloadFile,
    period: parsed.period ?? nonEmpty(env.PERIOD),
    slackChannel: parsed.channel ?? nonEmpty(env.SLACK_CHANNEL_ID),
    slackBotToken: nonEmpty(env.SLACK_BOT_TOKEN),
  };
}
