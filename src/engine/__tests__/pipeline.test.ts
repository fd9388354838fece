import { describe, it, expect } from 'vitest';
import { isTerminal, toOutcome, transition, type PipelineState, type RetryPolicy } from '../pipeline.js';
import { FetchError, ParseError, PipelineError, ServiceError } from '../../shared/errors.js';

const policy: RetryPolicy = { maxRetries: 3, retryDelayMs: 2000 };

const extracting = (attempt: number, lastRawResponse: string | null = null): PipelineState => ({
  stage: 'extracting',
  attempt,
  delayMs: 0,
  cleanText: 'page text',
  lastRawResponse,
});

describe('transition', () => {
  it('starts with the first fetch attempt and no delay', () => {
    expect(transition({ stage: 'pending' }, { type: 'begin' }, policy)).toEqual({
      stage: 'fetching',
      attempt: 1,
      delayMs: 0,
    });
  });

  it('retries a failed fetch after the retry delay', () => {
    const next = transition(
      { stage: 'fetching', attempt: 1, delayMs: 0 },
      { type: 'fetch_failed', error: new FetchError('HTTP 503') },
      policy,
    );
    expect(next).toEqual({ stage: 'fetching', attempt: 2, delayMs: 2000 });
  });

  it('gives up fetching once the budget is spent', () => {
    const next = transition(
      { stage: 'fetching', attempt: 3, delayMs: 2000 },
      { type: 'fetch_failed', error: new FetchError('HTTP 503') },
      policy,
    );
    expect(next).toEqual({ stage: 'fetch_failed', reason: 'HTTP 503', attempts: 3 });
  });

  it('moves to extraction with a fresh attempt counter after a fetch', () => {
    const next = transition({ stage: 'fetching', attempt: 2, delayMs: 2000 }, { type: 'fetched', cleanText: 'page text' }, policy);
    expect(next).toEqual(extracting(1));
  });

  it('re-queries after a parse failure and remembers the raw response', () => {
    const next = transition(
      extracting(1),
      { type: 'parse_failed', error: new ParseError('Malformed CSV', 'garbled') },
      policy,
    );
    expect(next).toEqual({ ...extracting(2, 'garbled'), delayMs: 2000 });
  });

  it('ends in parse_failed with the last raw response', () => {
    const next = transition(
      extracting(3, 'older'),
      { type: 'parse_failed', error: new ParseError('Malformed CSV', 'latest') },
      policy,
    );
    expect(next).toEqual({ stage: 'parse_failed', reason: 'Malformed CSV', rawResponse: 'latest', attempts: 3 });
  });

  it('counts transient service errors against the same budget', () => {
    const next = transition(
      extracting(3, 'garbled'),
      { type: 'service_failed', error: new ServiceError('HTTP 500', 'transient') },
      policy,
    );
    expect(next).toEqual({ stage: 'parse_failed', reason: 'HTTP 500', rawResponse: 'garbled', attempts: 3 });
  });

  it('backs off exponentially on quota errors', () => {
    const next = transition(
      extracting(2),
      { type: 'service_failed', error: new ServiceError('HTTP 429', 'quota') },
      policy,
    );
    expect(next).toMatchObject({ stage: 'extracting', attempt: 3, delayMs: 8000 });
  });

  it('rethrows auth errors instead of retrying', () => {
    const error = new ServiceError('HTTP 401', 'auth');
    expect(() => transition(extracting(1), { type: 'service_failed', error }, policy)).toThrow(error);
  });

  it('succeeds with the parsed records', () => {
    const records = [{ name: 'Ada Byron', title: 'Professor', notes: '' }];
    expect(transition(extracting(2), { type: 'extracted', records }, policy)).toEqual({
      stage: 'success',
      records,
      attempts: 2,
    });
  });

  it('never leaves a terminal state', () => {
    const done: PipelineState = { stage: 'fetch_failed', reason: 'x', attempts: 3 };
    expect(() => transition(done, { type: 'begin' }, policy)).toThrow(PipelineError);
  });

  it('rejects events that do not belong to the stage', () => {
    expect(() => transition({ stage: 'pending' }, { type: 'fetched', cleanText: '' }, policy)).toThrow(
      'Invalid transition: fetched in stage pending',
    );
  });
});

describe('isTerminal', () => {
  it('recognises the three terminal stages', () => {
    expect(isTerminal({ stage: 'success', records: [], attempts: 1 })).toBe(true);
    expect(isTerminal({ stage: 'fetch_failed', reason: '', attempts: 1 })).toBe(true);
    expect(isTerminal({ stage: 'parse_failed', reason: '', rawResponse: null, attempts: 1 })).toBe(true);
    expect(isTerminal({ stage: 'pending' })).toBe(false);
    expect(isTerminal(extracting(1))).toBe(false);
  });
});

describe('toOutcome', () => {
  it('produces a frozen outcome', () => {
    const outcome = toOutcome('https://a.example.edu', { stage: 'parse_failed', reason: 'bad', rawResponse: 'raw', attempts: 3 });
    expect(outcome).toEqual({ status: 'parse_failed', url: 'https://a.example.edu', reason: 'bad', rawResponse: 'raw', attempts: 3 });
    expect(Object.isFrozen(outcome)).toBe(true);
  });
});
