import { describe, it, expect } from 'vitest';
import { AuthError, ConfigError } from './errors.js';
import { loadConfig, parseArgs } from './config.js';
import { formatWindow } from './utils.js';

const NOW = new Date('2024-04-15T13:45:00Z');
const ENV = { GITHUB_TOKEN: 'test-token' };

describe('parseArgs', () => {
  it('reads the organization and flags', () => {
    const parsed = parseArgs(['acme', '--days', '30', '--quiet', '--payload-file', 'out.json']);

    expect(parsed.organization).toBe('acme');
    expect(parsed.days).toBe(30);
    expect(parsed.quiet).toBe(true);
    expect(parsed.payloadFile).toBe('out.json');
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });

  it('rejects a flag without its value', () => {
    expect(() => parseArgs(['--start-date'])).toThrow('--start-date requires a value');
    expect(() => parseArgs(['--days', '--quiet'])).toThrow('--days requires a value');
  });

  it('rejects non-numeric day counts', () => {
    expect(() => parseArgs(['--days', '-3'])).toThrow(ConfigError);
    expect(() => parseArgs(['--days', '1.5'])).toThrow(ConfigError);
  });

  it('rejects a second positional argument', () => {
    expect(() => parseArgs(['acme', 'other'])).toThrow('Unexpected argument: other');
  });
});

describe('loadConfig', () => {
  it('defaults to the last 90 days', () => {
    const config = loadConfig(['acme'], ENV, NOW);

    expect(config.organization).toBe('acme');
    expect(config.githubToken).toBe('test-token');
    expect(formatWindow(config.window)).toBe('2024-01-16 to 2024-04-15');
    expect(config.quiet).toBe(false);
    expect(config.payloadFile).toBeNull();
  });

  it('falls back to DEFAULT_ORG', () => {
    const config = loadConfig([], { ...ENV, DEFAULT_ORG: 'from-env' }, NOW);
    expect(config.organization).toBe('from-env');
  });

  it('prefers the argument over DEFAULT_ORG', () => {
    const config = loadConfig(['acme'], { ...ENV, DEFAULT_ORG: 'from-env' }, NOW);
    expect(config.organization).toBe('acme');
  });

  it('requires an organization', () => {
    expect(() => loadConfig([], ENV, NOW)).toThrow(ConfigError);
  });

  it('requires a token', () => {
    expect(() => loadConfig(['acme'], {}, NOW)).toThrow(AuthError);
    expect(() => loadConfig(['acme'], { GITHUB_TOKEN: '  ' }, NOW)).toThrow(AuthError);
  });

  it('accepts GH_TOKEN when GITHUB_TOKEN is missing', () => {
    expect(loadConfig(['acme'], { GH_TOKEN: 'test-gh-token' }, NOW).githubToken).toBe('test-gh-token');
  });

  it('uses --days', () => {
    const config = loadConfig(['acme', '--days', '7'], ENV, NOW);
    expect(formatWindow(config.window)).toBe('2024-04-08 to 2024-04-15');
  });

  it('rejects a --days value reaching past the representable dates', () => {
    expect(() => loadConfig(['acme', '--days', '200000000'], ENV, NOW)).toThrow(
      'Date range falls outside the dates this tool can represent'
    );
    expect(() => loadConfig(['acme', '--days', '99999999999999999999'], ENV, NOW)).toThrow(
      '--days must be a non-negative whole number, got "99999999999999999999"'
    );
  });

  it('uses an explicit start and end date', () => {
    const config = loadConfig(
      ['acme', '--start-date', '2024-01-01', '--end-date', '2024-03-31'],
      ENV,
      NOW
    );

    expect(config.window.start.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(config.window.end.toISOString()).toBe('2024-03-31T23:59:59.999Z');
  });

  it('ends a start-date-only window today', () => {
    const config = loadConfig(['acme', '--start-date', '2024-04-01'], ENV, NOW);
    expect(formatWindow(config.window)).toBe('2024-04-01 to 2024-04-15');
  });

  it('uses the previous month for --last-month', () => {
    const config = loadConfig(['acme', '--last-month'], ENV, NOW);
    expect(formatWindow(config.window)).toBe('2024-03-01 to 2024-03-31');
  });

  it('rejects --end-date on its own', () => {
    expect(() => loadConfig(['acme', '--end-date', '2024-03-31'], ENV, NOW)).toThrow(
      '--end-date requires --start-date'
    );
  });

  it('rejects more than one way of choosing the window', () => {
    expect(() => loadConfig(['acme', '--days', '7', '--start-date', '2024-01-01'], ENV, NOW)).toThrow(
      'Use only one of --days, --start-date or --last-month'
    );
  });

  it('rejects a start date after the end date', () => {
    expect(() =>
      loadConfig(['acme', '--start-date', '2024-03-01', '--end-date', '2024-02-01'], ENV, NOW)
    ).toThrow(ConfigError);
  });

  it('reads Slack settings from the environment', () => {
    const config = loadConfig(
      ['acme'],
      { ...ENV, SLACK_CHANNEL_ID: 'C0TEST', SLACK_BOT_TOKEN: 'test-slack-token', PERIOD: '2024-03' },
      NOW
    );

    expect(config.slackChannel).toBe('C0TEST');
    expect(config.slackBotToken).toBe('test-slack-token');
    expect(config.period).toBe('2024-03');
  });

  it('lets flags override Slack settings from the environment', () => {
    const config = loadConfig(
      ['acme', '--channel', 'C0FLAG', '--period', 'Q1'],
      { ...ENV, SLACK_CHANNEL_ID: 'C0TEST', PERIOD: '2024-03' },
      NOW
    );

    expect(config.slackChannel).toBe('C0FLAG');
    expect(config.period).toBe('Q1');
  });
});
