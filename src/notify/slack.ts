import fs from 'fs';
import path from 'path';
import { NotificationDeliveryError, errorMessage } from '../errors';
import { logger } from '../logger';
import type { Listing, RunResult } from '../scraper/types';
import { countListings, type Reporter } from './reporter';

type TextObject =
  | { type: 'plain_text'; text: string; emoji?: boolean }
  | { type: 'mrkdwn'; text: string };

interface ButtonElement {
  type: 'button';
  text: { type: 'plain_text'; text: string; emoji?: boolean };
  url: string;
  action_id: string;
}

export type SlackBlock =
  | { type: 'header'; text: { type: 'plain_text'; text: string; emoji?: boolean } }
  | { type: 'section'; text: TextObject; accessory?: ButtonElement }
  | { type: 'divider' };

export interface SlackMessage {
  text?: string;
  blocks?: SlackBlock[];
  username: string;
}

/** Slack rejects messages with more blocks than this. */
export const MAX_BLOCKS_PER_MESSAGE = 50;

const REPORT_USERNAME = 'Job Alert Bot';
const DEBUG_USERNAME = 'Debug Bot';

/**
 * Escapes the three characters Slack treats as control sequences.
 */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

const FORMATTING_LOOKALIKES: Record<string, string> = {
  '*': '\u2217',
  '_': '\u02CD',
  '~': '\u223C',
  '`': '\u02CB',
};

/**
 * Escapes scraped or configured text for mrkdwn and swaps the bold,
 * italic, strike and code markers for lookalike characters, so the text
 * cannot open or close formatting around it.
 */
export function plainMrkdwn(text: string): string {
  return escapeMrkdwn(text).replace(/[*_~`]/g, (marker) => FORMATTING_LOOKALIKES[marker] ?? marker);
}

/** `2026-10-18 07:30 UTC` */
export function formatTimestamp(now: Date): string {
  return `${now.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function listingBlock(listing: Listing, n: number): SlackBlock {
  const block: Extract<SlackBlock, { type: 'section' }> = {
    type: 'section',
    text: {
      type: 'mrkdwn',
      text:
        `*${n}. ${plainMrkdwn(listing.title)}*\n` +
        `${plainMrkdwn(listing.company)}\n` +
        `${plainMrkdwn(listing.location)}\n` +
        `${plainMrkdwn(listing.salary)}`,
    },
  };
  if (listing.link) {
    block.accessory = {
      type: 'button',
      text: { type: 'plain_text', text: 'Apply', emoji: true },
      url: listing.link,
      action_id: `button_${n}`,
    };
  }
  return block;
}

/**
 * Renders the run report. A run with no listings becomes one plain-text
 * message; otherwise the blocks are split across as many messages as
 * Slack's block limit requires.
 */
export function buildReportMessages(
  results: RunResult,
  options: { now: Date; debugNote?: string },
): SlackMessage[] {
  const total = countListings(results);

  if (total === 0) {
    const debugText = options.debugNote ? `\n\n*Debug Information:*\n${options.debugNote}` : '';
    return [{ text: `No matching results found.${debugText}`, username: REPORT_USERNAME }];
  }

  const blocks: SlackBlock[] = [
    { type: 'header', text: { type: 'plain_text', text: `${total} Jobs Found`, emoji: true } },
    { type: 'section', text: { type: 'mrkdwn', text: `_Updated: ${formatTimestamp(options.now)}_` } },
    { type: 'divider' },
  ];

  let n = 1;
  let locationsWithJobs = 0;
  for (const [location, listings] of results) {
    if (listings.length === 0) continue;
    locationsWithJobs++;
    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: `*${plainMrkdwn(location)}* - ${listings.length} jobs` },
    });
    for (const listing of listings) {
      blocks.push(listingBlock(listing, n));
      n++;
    }
  }

  blocks.push({ type: 'divider' });
  blocks.push({
    type: 'section',
    text: { type: 'mrkdwn', text: `*Total: ${total} jobs across ${locationsWithJobs} locations*` },
  });

  const messages: SlackMessage[] = [];
  for (let start = 0; start < blocks.length; start += MAX_BLOCKS_PER_MESSAGE) {
    messages.push({
      text: start === 0 ? `${total} Jobs Found` : `${total} Jobs Found (continued)`,
      blocks: blocks.slice(start, start + MAX_BLOCKS_PER_MESSAGE),
      username: REPORT_USERNAME,
    });
  }
  return messages;
}

/**
 * Renders a failure diagnostic for one location.
 */
export function buildDebugMessage(location: string, details: string, screenshotPath: string | null): SlackMessage {
  const screenshotNote = screenshotPath
    ? `_Screenshot saved to ${screenshotPath}_`
    : '_No screenshot captured_';
  return {
    text: `Debug Info for ${location}`,
    blocks: [
      {
        type: 'section',
        text: {
          type: 'mrkdwn',
          text: `*Debug Info - ${plainMrkdwn(location)}*\n${escapeMrkdwn(details)}\n\n${screenshotNote}`,
        },
      },
    ],
    username: DEBUG_USERNAME,
  };
}

export type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{ ok: boolean; status: number }>;

/**
 * Posts one message to an incoming webhook.
 * Throws NotificationDeliveryError on a network failure or non-2xx status.
 */
export async function postToWebhook(webhookUrl: string, message: SlackMessage, fetchImpl: FetchLike = fetch): Promise<void> {
  let response: { ok: boolean; status: number };
  try {
    response = await fetchImpl(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(message),
    });
  } catch (error) {
    throw new NotificationDeliveryError(`Webhook request failed: ${errorMessage(error)}`, null, { cause: error });
  }
  if (!response.ok) {
    throw new NotificationDeliveryError(`Webhook responded with ${response.status}`, response.status);
  }
}

export interface SlackReporterOptions {
  webhookUrl: string;
  /** Where failure screenshots are written */
  debugDir: string;
  fetch?: FetchLike;
  now?: () => Date;
}

/**
 * Reporter backed by a Slack incoming webhook. Delivery failures are
 * logged and not retried.
 */
export class SlackReporter implements Reporter {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(private readonly options: SlackReporterOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async sendReport(results: RunResult, debugNote?: string): Promise<void> {
    const total = countListings(results);
    const messages = buildReportMessages(results, { now: this.now(), debugNote });

    let delivered = 0;
    for (const message of messages) {
      try {
        await postToWebhook(this.options.webhookUrl, message, this.fetchImpl);
        delivered++;
      } catch (error) {
        logger.error('Notification failed', {
          error: errorMessage(error),
          status: error instanceof NotificationDeliveryError ? error.status : undefined,
        });
      }
    }

    if (delivered === messages.length) {
      logger.info(`Notification sent: ${total} jobs`, { messages: messages.length });
    }
  }

  async sendDebug(location: string, details: string, screenshot: Buffer | null): Promise<void> {
    const screenshotPath = screenshot ? this.saveScreenshot(location, screenshot) : null;
    try {
      await postToWebhook(
        this.options.webhookUrl,
        buildDebugMessage(location, details, screenshotPath),
        this.fetchImpl,
      );
      logger.info('Debug info sent to Slack', { location, screenshotPath });
    } catch (error) {
      logger.error('Failed to send debug info', { location, error: errorMessage(error) });
    }
  }

  /**
   * Writes the screenshot under the debug directory. Returns null if it
   * could not be written.
   */
  private saveScreenshot(location: string, screenshot: Buffer): string | null {
    const slug = location.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'location';
    const stamp = this.now().toISOString().replace(/[:.]/g, '-');
    const filePath = path.join(this.options.debugDir, `${slug}-${stamp}.png`);
    try {
      if (!fs.existsSync(this.options.debugDir)) {
        fs.mkdirSync(this.options.debugDir, { recursive: true });
      }
      fs.writeFileSync(filePath, screenshot);
      return filePath;
    } catch (error) {
      logger.warn('Could not save debug screenshot', { location, error: errorMessage(error) });
      return null;
    }
  }
}
