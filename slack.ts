import { z } from 'zod';
import type { AggregateReport } from './types.js';
import { SlackError } from './errors.js';
import { formatReportText } from './output.js';
import { formatWindow } from './utils.js';

const SLACK_POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage';

// Slack rejects section blocks whose text exceeds this
export const SLACK_SECTION_LIMIT = 3000;

export interface SlackTextObject {
  type: 'plain_text' | 'mrkdwn';
  text: string;
}

export type SlackBlock =
  | { type: 'header'; text: SlackTextObject }
  | { type: 'section'; text: SlackTextObject };

export interface SlackPayload {
  channel?: string;
  text: string;
  blocks?: SlackBlock[];
}

export interface SlackPayloadOptions {
  organization: string;
  period?: string | null;
  channel?: string | null;
}

const slackMessageResponseSchema = z.object({
  ok: z.boolean(),
  ts: z.string().optional(),
  channel: z.string().optional(),
  error: z.string().optional(),
});

/**
 * Wrap text in a code block, cutting it short so the section stays postable
 */
export function toCodeBlock(text: string): string {
  const fence = '```';
  const room = SLACK_SECTION_LIMIT - fence.length * 2;
  if (text.length <= room) {
    return `${fence}${text}${fence}`;
  }

  const marker = '\n… (truncated)';
  const cut = text.slice(0, room - marker.length);
  const lastBreak = cut.lastIndexOf('\n');
  const kept = lastBreak > 0 ? cut.slice(0, lastBreak) : cut;
  return `${fence}${kept}${marker}${fence}`;
}

/**
 * Build the chat.postMessage payload for a finished report
 */
export function buildSlackPayload(report: AggregateReport, options: SlackPayloadOptions): SlackPayload {
  const period = options.period ?? formatWindow(report.window);
  const title = `PR Statistics for ${period}`;
  const statsText = formatReportText(report, options.organization);

  const summary = report.totalPullRequests === 0
    ? statsText
    : `*${report.totalPullRequests}* pull requests opened in *${options.organization}* ` +
      `across *${Object.keys(report.byRepository).length}* repositories.`;

  const blocks: SlackBlock[] = [
    { type: 'header', text: { type: 'plain_text', text: title } },
    { type: 'section', text: { type: 'mrkdwn', text: summary } },
  ];

  if (report.totalPullRequests > 0) {
    blocks.push({ type: 'section', text: { type: 'mrkdwn', text: toCodeBlock(statsText) } });
  }

  return {
    ...(options.channel ? { channel: options.channel } : {}),
    text: `${title}: ${report.totalPullRequests} pull requests`,
    blocks,
  };
}

/**
 * Plain message standing in for the report when the run fails
 */
export function buildErrorPayload(message: string, channel?: string | null): SlackPayload {
  return {
    ...(channel ? { channel } : {}),
    text: `Error generating PR statistics: ${message}`,
  };
}

/**
 * Post a prepared payload using the Web API; returns the message timestamp
 */
export async function postPayloadToSlack(botToken: string, payload: SlackPayload): Promise<string> {
  if (!payload.channel) {
    throw new SlackError('Cannot post to Slack without a channel');
  }

  const response = await fetch(SLACK_POST_MESSAGE_URL, {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${botToken}`,
      'Content-Type': 'application/json; charset=utf-8',
    },
    body: JSON.stringify(payload),
  });

  if (!response.ok) {
    throw new SlackError(`Failed to post to Slack: ${response.status} ${response.statusText}`);
  }

  const data = slackMessageResponseSchema.parse(await response.json());

  if (!data.ok || !data.ts) {
    throw new SlackError(`Failed to post to Slack: ${data.error ?? 'no message timestamp returned'}`);
  }

  return data.ts;
}
