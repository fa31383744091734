import { describe, it, expect } from 'vitest';
import { NavigationError } from '../../errors';
import { navigate } from '../navigator';
import { FakeElement, FakeSession, recordingSleep } from './fakes';

const fixed = { min: 5000, max: 5000 };

describe('navigate (direct)', () => {
  it('loads the URL, pays the settle delay and reports where it landed', async () => {
    const session = new FakeSession({ url: 'https://uk.indeed.com/jobs?q=x&vjk=1' });
    const { sleep, calls } = recordingSleep();

    const result = await navigate(session, { kind: 'direct', url: 'https://uk.indeed.com/jobs?q=x' }, fixed, sleep);

    expect(session.visited).toEqual(['https://uk.indeed.com/jobs?q=x']);
    expect(calls).toEqual([5000]);
    expect(result).toEqual({ currentUrl: 'https://uk.indeed.com/jobs?q=x&vjk=1', warnings: [] });
  });

  it('draws a randomized delay from the range', async () => {
    const { sleep, calls } = recordingSleep();
    await navigate(new FakeSession(), { kind: 'direct', url: 'https://www.indeed.com/jobs' }, { min: 2000, max: 3000 }, sleep);
    expect(calls).toHaveLength(1);
    expect(calls[0]).toBeGreaterThanOrEqual(2000);
    expect(calls[0]).toBeLessThanOrEqual(3000);
  });

  it('wraps page-load failures in NavigationError', async () => {
    const session = new FakeSession({ gotoError: new Error('net::ERR_CONNECTION_RESET') });
    const { sleep } = recordingSleep();

    await expect(
      navigate(session, { kind: 'direct', url: 'https://www.indeed.com/jobs' }, fixed, sleep),
    ).rejects.toThrow(new NavigationError('Failed to load https://www.indeed.com/jobs: net::ERR_CONNECTION_RESET'));
  });
});

describe('navigate (form)', () => {
  const target = {
    kind: 'form' as const,
    baseUrl: 'https://uk.indeed.com/',
    jobTitle: 'Data Analyst',
    location: 'London, UK',
  };

  it('fills both inputs and clicks submit', async () => {
    const what = new FakeElement();
    const where = new FakeElement();
    const submit = new FakeElement();
    const session = new FakeSession({
      elements: {
        '#text-input-what': [what],
        'input[name="l"]': [where],
        'button[type="submit"]': [submit],
      },
    });
    const { sleep, calls } = recordingSleep();

    const result = await navigate(session, target, fixed, sleep);

    expect(session.visited).toEqual(['https://uk.indeed.com/']);
    expect(what.filled).toBe('Data Analyst');
    expect(where.filled).toBe('London, UK');
    expect(submit.clicks).toBe(1);
    expect(calls).toEqual([5000]);
    expect(result.warnings).toEqual([]);
  });

  it('presses Enter when no submit button resolves, and warns about a missing input', async () => {
    const what = new FakeElement();
    const session = new FakeSession({ elements: { 'input[name="q"]': [what] } });
    const { sleep } = recordingSleep();

    const result = await navigate(session, target, fixed, sleep);

    expect(what.filled).toBe('Data Analyst');
    expect(what.pressed).toEqual(['Enter']);
    expect(result.warnings).toEqual(['"Where" input not found; searching by title only']);
  });

  it('fails when neither input resolves', async () => {
    const { sleep, calls } = recordingSleep();

    await expect(navigate(new FakeSession(), target, fixed, sleep)).rejects.toBeInstanceOf(NavigationError);
    expect(calls).toEqual([]);
  });
});
