import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { NotificationDeliveryError } from '../../errors';
import type { Listing, RunResult } from '../../scraper/types';
import {
  buildDebugMessage,
  buildReportMessages,
  escapeMrkdwn,
  formatTimestamp,
  plainMrkdwn,
  postToWebhook,
  SlackReporter,
  type FetchLike,
  type SlackMessage,
} from '../slack';

const NOW = new Date('2026-10-18T07:30:45.123Z');
const WEBHOOK = 'https://hooks.example.test/webhook';

function listing(title: string, link?: string): Listing {
  return {
    title,
    company: 'Acme Ltd',
    location: 'London',
    salary: 'Not listed',
    ...(link ? { link } : {}),
  };
}

function recordingFetch(status = 200) {
  const posted: SlackMessage[] = [];
  const urls: string[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    urls.push(url);
    posted.push(JSON.parse(init.body));
    return { ok: status >= 200 && status < 300, status };
  };
  return { posted, urls, fetchImpl };
}

describe('escapeMrkdwn', () => {
  it('escapes Slack control characters', () => {
    expect(escapeMrkdwn('R&D <Lead> > Analyst')).toBe('R&amp;D &lt;Lead&gt; &gt; Analyst');
  });
});

describe('plainMrkdwn', () => {
  it('swaps formatting markers for lookalikes after escaping', () => {
    expect(plainMrkdwn('C++ *Urgent* Dev_Ops ~now~ `x` & <y>')).toBe(
      'C++ \u2217Urgent\u2217 Dev\u02CDOps \u223Cnow\u223C \u02CBx\u02CB &amp; &lt;y&gt;',
    );
  });
});

describe('formatTimestamp', () => {
  it('renders minutes in UTC', () => {
    expect(formatTimestamp(NOW)).toBe('2026-10-18 07:30 UTC');
  });
});

describe('buildReportMessages', () => {
  it('renders a single plain message when nothing was found', () => {
    const results: RunResult = new Map([['Paris', []]]);
    expect(buildReportMessages(results, { now: NOW })).toEqual([
      { text: 'No matching results found.', username: 'Job Alert Bot' },
    ]);
  });

  it('appends the debug note to an empty report', () => {
    const results: RunResult = new Map();
    const [message] = buildReportMessages(results, { now: NOW, debugNote: 'Check screenshots' });
    expect(message.text).toBe('No matching results found.\n\n*Debug Information:*\nCheck screenshots');
  });

  it('groups listings by location with running numbers and apply buttons', () => {
    const results: RunResult = new Map([
      ['London, UK', [listing('Data Analyst', 'https://uk.indeed.com/viewjob?jk=a1'), listing('BI <Analyst>')]],
      ['Paris', []],
      ['Berlin', [listing('Datenanalyst', 'https://de.indeed.com/viewjob?jk=c3')]],
    ]);

    const messages = buildReportMessages(results, { now: NOW });

    expect(messages).toHaveLength(1);
    expect(messages[0].text).toBe('3 Jobs Found');
    expect(messages[0].username).toBe('Job Alert Bot');
    expect(messages[0].blocks).toEqual([
      { type: 'header', text: { type: 'plain_text', text: '3 Jobs Found', emoji: true } },
      { type: 'section', text: { type: 'mrkdwn', text: '_Updated: 2026-10-18 07:30 UTC_' } },
      { type: 'divider' },
      { type: 'section', text: { type: 'mrkdwn', text: '*London, UK* - 2 jobs' } },
      {
        type: 'section',
        text: { type: 'mrkdwn', text: '*1. Data Analyst*\nAcme Ltd\nLondon\nNot listed' },
        accessory: {
          type: 'button',
          text: { type: 'plain_text', text: 'Apply', emoji: true },
          url: 'https://uk.indeed.com/viewjob?jk=a1',
          action_id: 'button_1',
        },
      },
      { type: 'section', text: { type: 'mrkdwn', text: '*2. BI &lt;Analyst&gt;*\nAcme Ltd\nLondon\nNot listed' } },
      { type: 'section', text: { type: 'mrkdwn', text: '*Berlin* - 1 jobs' } },
      {
        type: 'section',
        text: { type: 'mrkdwn', text: '*3. Datenanalyst*\nAcme Ltd\nLondon\nNot listed' },
        accessory: {
          type: 'button',
          text: { type: 'plain_text', text: 'Apply', emoji: true },
          url: 'https://de.indeed.com/viewjob?jk=c3',
          action_id: 'button_3',
        },
      },
      { type: 'divider' },
      { type: 'section', text: { type: 'mrkdwn', text: '*Total: 3 jobs across 2 locations*' } },
    ]);
  });

  it('keeps a scraped title from breaking the bold around it', () => {
    const messages = buildReportMessages(new Map([['London', [listing('C++ *Urgent* Dev')]]]), { now: NOW });
    expect(messages[0].blocks?.[4]).toEqual({
      type: 'section',
      text: { type: 'mrkdwn', text: '*1. C++ \u2217Urgent\u2217 Dev*\nAcme Ltd\nLondon\nNot listed' },
    });
  });

  it('splits reports that exceed the block limit', () => {
    const many = Array.from({ length: 60 }, (_, i) => listing(`Analyst ${i + 1}`));
    const messages = buildReportMessages(new Map([['London', many]]), { now: NOW });

    // 3 header blocks + 1 location + 60 listings + divider + total = 66
    expect(messages.map((m) => m.blocks?.length)).toEqual([50, 16]);
    expect(messages.map((m) => m.text)).toEqual(['60 Jobs Found', '60 Jobs Found (continued)']);
    expect(messages[1].blocks?.[15]).toEqual({
      type: 'section',
      text: { type: 'mrkdwn', text: '*Total: 60 jobs across 1 locations*' },
    });
  });
});

describe('buildDebugMessage', () => {
  it('includes the escaped details and the screenshot location', () => {
    expect(buildDebugMessage('Paris', 'No job cards found on page\nURL: https://x.test/?a=1&b=2', '/tmp/paris.png')).toEqual({
      text: 'Debug Info for Paris',
      blocks: [
        {
          type: 'section',
          text: {
            type: 'mrkdwn',
            text:
              '*Debug Info - Paris*\nNo job cards found on page\nURL: https://x.test/?a=1&amp;b=2\n\n_Screenshot saved to /tmp/paris.png_',
          },
        },
      ],
      username: 'Debug Bot',
    });
  });

  it('says when there is no screenshot', () => {
    const message = buildDebugMessage('Paris', 'Browser session failed', null);
    const block = message.blocks?.[0];
    expect(block?.type === 'section' && block.text.text).toBe(
      '*Debug Info - Paris*\nBrowser session failed\n\n_No screenshot captured_',
    );
  });
});

describe('postToWebhook', () => {
  it('posts the message as JSON', async () => {
    const calls: Array<{ url: string; method: string; contentType: string; body: string }> = [];
    await postToWebhook(WEBHOOK, { text: 'hello', username: 'Job Alert Bot' }, async (url, init) => {
      calls.push({ url, method: init.method, contentType: init.headers['Content-Type'], body: init.body });
      return { ok: true, status: 200 };
    });

    expect(calls).toEqual([
      {
        url: WEBHOOK,
        method: 'POST',
        contentType: 'application/json',
        body: '{"text":"hello","username":"Job Alert Bot"}',
      },
    ]);
  });

  it('raises a delivery error carrying the status', async () => {
    const error = await postToWebhook(WEBHOOK, { text: 'x', username: 'u' }, async () => ({ ok: false, status: 404 })).catch(
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(NotificationDeliveryError);
    expect(error instanceof NotificationDeliveryError && error.status).toBe(404);
    expect(error instanceof Error && error.message).toBe('Webhook responded with 404');
  });

  it('raises a delivery error on a network failure', async () => {
    await expect(
      postToWebhook(WEBHOOK, { text: 'x', username: 'u' }, async () => {
        throw new Error('getaddrinfo ENOTFOUND');
      }),
    ).rejects.toThrow('Webhook request failed: getaddrinfo ENOTFOUND');
  });
});

describe('SlackReporter', () => {
  let debugDir: string;

  beforeEach(() => {
    debugDir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-alert-'));
  });

  afterEach(() => {
    fs.rmSync(debugDir, { recursive: true, force: true });
  });

  it('posts every chunk of the report', async () => {
    const { posted, urls, fetchImpl } = recordingFetch();
    const reporter = new SlackReporter({ webhookUrl: WEBHOOK, debugDir, fetch: fetchImpl, now: () => NOW });
    const many = Array.from({ length: 60 }, (_, i) => listing(`Analyst ${i + 1}`));

    await reporter.sendReport(new Map([['London', many]]));

    expect(posted).toHaveLength(2);
    expect(urls).toEqual([WEBHOOK, WEBHOOK]);
  });

  it('does not throw when the webhook rejects the report', async () => {
    const { fetchImpl } = recordingFetch(500);
    const reporter = new SlackReporter({ webhookUrl: WEBHOOK, debugDir, fetch: fetchImpl, now: () => NOW });

    await expect(reporter.sendReport(new Map([['Paris', []]]), 'note')).resolves.toBeUndefined();
  });

  it('saves the screenshot and references it in the debug message', async () => {
    const { posted, fetchImpl } = recordingFetch();
    const reporter = new SlackReporter({ webhookUrl: WEBHOOK, debugDir, fetch: fetchImpl, now: () => NOW });

    await reporter.sendDebug('London, UK', 'Bot detection triggered - captcha or block page', Buffer.from('png-bytes'));

    const expectedPath = path.join(debugDir, 'london-uk-2026-10-18T07-30-45-123Z.png');
    expect(fs.readFileSync(expectedPath, 'utf8')).toBe('png-bytes');
    expect(posted).toHaveLength(1);
    const block = posted[0].blocks?.[0];
    expect(block?.type === 'section' && block.text.text).toBe(
      `*Debug Info - London, UK*\nBot detection triggered - captcha or block page\n\n_Screenshot saved to ${expectedPath}_`,
    );
  });

  it('creates the debug directory when it is missing', async () => {
    const { fetchImpl } = recordingFetch();
    const nested = path.join(debugDir, 'nested', 'shots');
    const reporter = new SlackReporter({ webhookUrl: WEBHOOK, debugDir: nested, fetch: fetchImpl, now: () => NOW });

    await reporter.sendDebug('Paris', 'details', Buffer.from('x'));

    expect(fs.readdirSync(nested)).toEqual(['paris-2026-10-18T07-30-45-123Z.png']);
  });

  it('does not throw when the debug post fails', async () => {
    const reporter = new SlackReporter({
      webhookUrl: WEBHOOK,
      debugDir,
      fetch: async () => {
        throw new Error('socket hang up');
      },
      now: () => NOW,
    });

    await expect(reporter.sendDebug('Paris', 'details', null)).resolves.toBeUndefined();
  });
});
