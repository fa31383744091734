import { describe, it, expect, vi, afterEach } from 'vitest';
import { NO_RESULTS_NOTE, runJobAlert, startScheduler } from '../scheduler';
import type { RunResult } from '../scraper/types';
import { FakeSession, indeedCard, recordingSleep, testConfig } from '../scraper/__tests__/fakes';

function recordingReporter() {
  const reports: Array<{ results: RunResult; debugNote: string | undefined }> = [];
  return {
    reports,
    sendReport: async (results: RunResult, debugNote?: string) => {
      reports.push({ results, debugNote });
    },
    sendDebug: async () => undefined,
  };
}

describe('runJobAlert', () => {
  it('sends one report with every location and no note when jobs were found', async () => {
    const reporter = recordingReporter();
    const sessions = [
      new FakeSession({ elements: { job_seen_beacon: [indeedCard({ title: 'Data Analyst' })] } }),
      new FakeSession(),
    ];

    const summary = await runJobAlert(testConfig(), {
      launch: async () => sessions.shift() ?? new FakeSession(),
      reporter,
      sleep: recordingSleep().sleep,
    });

    expect(summary.totalListings).toBe(1);
    expect(reporter.reports).toHaveLength(1);
    expect([...reporter.reports[0].results.keys()]).toEqual(['London, UK', 'Paris']);
    expect(reporter.reports[0].debugNote).toBeUndefined();
  });

  it('attaches the no-results note when every location came back empty', async () => {
    const reporter = recordingReporter();

    await runJobAlert(testConfig(), {
      launch: async () => new FakeSession(),
      reporter,
      sleep: recordingSleep().sleep,
    });

    expect(reporter.reports).toHaveLength(1);
    expect(reporter.reports[0].debugNote).toBe(NO_RESULTS_NOTE);
  });
});

describe('startScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs a cycle immediately and schedules nothing when the interval is 0', async () => {
    const reporter = recordingReporter();
    const launch = vi.fn(async () => new FakeSession());

    const handle = startScheduler(testConfig({ JOB_LOCATIONS: 'Paris' }), {
      launch,
      reporter,
      sleep: recordingSleep().sleep,
    });
    await handle.idle();
    handle.stop();

    expect(launch).toHaveBeenCalledTimes(1);
    expect(reporter.reports).toHaveLength(1);
  });

  it('repeats on the interval until stopped', async () => {
    vi.useFakeTimers();
    const reporter = recordingReporter();
    const launch = vi.fn(async () => new FakeSession());

    const handle = startScheduler(testConfig({ JOB_LOCATIONS: 'Paris', RUN_INTERVAL_MINUTES: '30' }), {
      launch,
      reporter,
      sleep: recordingSleep().sleep,
    });
    await handle.idle();
    expect(reporter.reports).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(30 * 60_000);
    await handle.idle();
    expect(reporter.reports).toHaveLength(2);

    handle.stop();
    await vi.advanceTimersByTimeAsync(60 * 60_000);
    expect(reporter.reports).toHaveLength(2);
  });

  it('keeps the schedule alive when a cycle rejects', async () => {
    const handle = startScheduler(testConfig({ JOB_LOCATIONS: 'Paris' }), {
      launch: async () => new FakeSession(),
      reporter: {
        sendReport: async () => {
          throw new Error('reporter exploded');
        },
        sendDebug: async () => undefined,
      },
      sleep: recordingSleep().sleep,
    });

    await expect(handle.idle()).resolves.toBeUndefined();
    handle.stop();
  });
});
