import { PipelineError, type FetchError, type ParseError, type ServiceError } from '../shared/errors.js';
import type { ProfessorRecord } from '../llm/parse.js';

export interface RetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
}

// ============================================================
// States
// ============================================================

export interface PendingState {
  readonly stage: 'pending';
}

export interface FetchingState {
  readonly stage: 'fetching';
  readonly attempt: number;
  readonly delayMs: number;
}

export interface ExtractingState {
  readonly stage: 'extracting';
  readonly attempt: number;
  readonly delayMs: number;
  readonly cleanText: string;
  readonly lastRawResponse: string | null;
}

export interface SuccessState {
  readonly stage: 'success';
  readonly records: readonly ProfessorRecord[];
  readonly attempts: number;
}

export interface FetchFailedState {
  readonly stage: 'fetch_failed';
  readonly reason: string;
  readonly attempts: number;
}

export interface ParseFailedState {
  readonly stage: 'parse_failed';
  readonly reason: string;
  readonly rawResponse: string | null;
  readonly attempts: number;
}

export type TerminalState = SuccessState | FetchFailedState | ParseFailedState;
export type PipelineState = PendingState | FetchingState | ExtractingState | TerminalState;

export type PipelineEvent =
  | { readonly type: 'begin' }
  | { readonly type: 'fetched'; readonly cleanText: string }
  | { readonly type: 'fetch_failed'; readonly error: FetchError }
  | { readonly type: 'extracted'; readonly records: readonly ProfessorRecord[] }
  | { readonly type: 'parse_failed'; readonly error: ParseError }
  | { readonly type: 'service_failed'; readonly error: ServiceError };

export function isTerminal(state: PipelineState): state is TerminalState {
  return state.stage === 'success' || state.stage === 'fetch_failed' || state.stage === 'parse_failed';
}

// ============================================================
// Outcomes
// ============================================================

export type UrlOutcome =
  | { readonly status: 'success'; readonly url: string; readonly records: readonly ProfessorRecord[] }
  | { readonly status: 'fetch_failed'; readonly url: string; readonly reason: string; readonly attempts: number }
  | {
      readonly status: 'parse_failed';
      readonly url: string;
      readonly reason: string;
      readonly rawResponse: string | null;
      readonly attempts: number;
    };

function freeze(outcome: UrlOutcome): UrlOutcome {
  return Object.freeze(outcome);
}

export function toOutcome(url: string, state: TerminalState): UrlOutcome {
  switch (state.stage) {
    case 'success':
      return freeze({ status: 'success', url, records: Object.freeze([...state.records]) });
    case 'fetch_failed':
      return freeze({ status: 'fetch_failed', url, reason: state.reason, attempts: state.attempts });
    case 'parse_failed':
      return freeze({
        status: 'parse_failed',
        url,
        reason: state.reason,
        rawResponse: state.rawResponse,
        attempts: state.attempts,
      });
  }
}

// ============================================================
// Transitions
// ============================================================

function invalid(state: PipelineState, event: PipelineEvent): never {
  throw new PipelineError(`Invalid transition: ${event.type} in stage ${state.stage}`, {
    stage: state.stage,
    event: event.type,
  });
}

function quotaBackoff(policy: RetryPolicy, attempt: number): number {
  return policy.retryDelayMs * 2 ** attempt;
}

function retryExtraction(
  state: ExtractingState,
  policy: RetryPolicy,
  reason: string,
  rawResponse: string | null,
  delayMs: number,
): PipelineState {
  if (state.attempt >= policy.maxRetries) {
    return { stage: 'parse_failed', reason, rawResponse, attempts: state.attempt };
  }
  return {
    stage: 'extracting',
    attempt: state.attempt + 1,
    delayMs,
    cleanText: state.cleanText,
    lastRawResponse: rawResponse,
  };
}

/**
 * Advance one URL's pipeline. The attempt counter belongs to the stage, so
 * every retryable failure in that stage spends the same budget. An auth
 * ServiceError is rethrown: it ends the run, not the URL.
 */
export function transition(state: PipelineState, event: PipelineEvent, policy: RetryPolicy): PipelineState {
  switch (state.stage) {
    case 'pending':
      if (event.type !== 'begin') return invalid(state, event);
      return { stage: 'fetching', attempt: 1, delayMs: 0 };

    case 'fetching':
      if (event.type === 'fetched') {
        return { stage: 'extracting', attempt: 1, delayMs: 0, cleanText: event.cleanText, lastRawResponse: null };
      }
      if (event.type === 'fetch_failed') {
        if (state.attempt >= policy.maxRetries) {
          return { stage: 'fetch_failed', reason: event.error.message, attempts: state.attempt };
        }
        return { stage: 'fetching', attempt: state.attempt + 1, delayMs: policy.retryDelayMs };
      }
      return invalid(state, event);

    case 'extracting':
      switch (event.type) {
        case 'extracted':
          return { stage: 'success', records: event.records, attempts: state.attempt };
        case 'parse_failed':
          return retryExtraction(state, policy, event.error.message, event.error.rawResponse, policy.retryDelayMs);
        case 'service_failed': {
          if (!event.error.retryable) throw event.error;
          const delayMs =
            event.error.kind === 'quota' ? quotaBackoff(policy, state.attempt) : policy.retryDelayMs;
          return retryExtraction(state, policy, event.error.message, state.lastRawResponse, delayMs);
        }
        default:
          return invalid(state, event);
      }

    default:
      return invalid(state, event);
  }
}
