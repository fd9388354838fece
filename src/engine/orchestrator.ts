import type { Logger } from 'pino';
import { FetchError, ParseError, ServiceError } from '../shared/errors.js';
import { logger as defaultLogger } from '../shared/logger.js';
import { sleep as defaultSleep } from '../shared/utils.js';
import type { Config } from '../shared/config.js';
import type { PageSource } from '../source/fetch.js';
import type { ProfessorExtractor } from '../llm/extractor.js';
import {
  toOutcome,
  transition,
  type ExtractingState,
  type PipelineEvent,
  type PipelineState,
  type RetryPolicy,
  type UrlOutcome,
} from './pipeline.js';

export interface OrchestratorDeps {
  fetcher: PageSource;
  extractor: ProfessorExtractor;
  policy: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export function retryPolicyFromConfig(config: Config['retry']): RetryPolicy {
  return { maxRetries: config.max_retries, retryDelayMs: config.retry_delay_ms };
}

/**
 * Drives one URL at a time through the fetch and extract+parse retry loops.
 * Only an auth ServiceError escapes process(); every other failure ends as an outcome.
 */
export class RetryOrchestrator {
  private readonly fetcher: PageSource;
  private readonly extractor: ProfessorExtractor;
  private readonly policy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(deps: OrchestratorDeps) {
    this.fetcher = deps.fetcher;
    this.extractor = deps.extractor;
    this.policy = deps.policy;
    this.sleep = deps.sleep ?? defaultSleep;
    this.log = deps.logger ?? defaultLogger;
  }

  async process(url: string): Promise<UrlOutcome> {
    this.log.info({ url }, `Processing URL: ${url}`);
    let state: PipelineState = { stage: 'pending' };

    for (;;) {
      switch (state.stage) {
        case 'pending':
          state = transition(state, { type: 'begin' }, this.policy);
          break;

        case 'fetching':
          if (state.delayMs > 0) await this.sleep(state.delayMs);
          state = transition(state, await this.attemptFetch(url, state.attempt), this.policy);
          break;

        case 'extracting':
          if (state.delayMs > 0) await this.sleep(state.delayMs);
          state = transition(state, await this.attemptExtract(url, state), this.policy);
          break;

        default:
          return toOutcome(url, state);
      }
    }
  }

  private async attemptFetch(url: string, attempt: number): Promise<PipelineEvent> {
    this.log.info({ url, attempt, max: this.policy.maxRetries }, `Fetching URL (attempt ${attempt}/${this.policy.maxRetries})`);
    try {
      const cleanText = await this.fetcher.fetch(url);
      this.log.info({ url, chars: cleanText.length }, `Fetched ${cleanText.length} characters`);
      return { type: 'fetched', cleanText };
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      this.log.warn({ url, attempt, error: err.message }, 'Network error fetching page');
      return { type: 'fetch_failed', error: err };
    }
  }

  private async attemptExtract(url: string, state: ExtractingState): Promise<PipelineEvent> {
    const { attempt } = state;
    this.log.info({ url, attempt, max: this.policy.maxRetries }, `Querying model (attempt ${attempt}/${this.policy.maxRetries})`);
    try {
      const { records } = await this.extractor.extract(state.cleanText, url);
      return { type: 'extracted', records };
    } catch (err) {
      if (err instanceof ParseError) {
        this.log.warn({ url, attempt, error: err.message }, 'Model output could not be parsed');
        return { type: 'parse_failed', error: err };
      }
      if (err instanceof ServiceError) {
        this.log.warn({ url, attempt, kind: err.kind, error: err.message }, 'Model service error');
        return { type: 'service_failed', error: err };
      }
      throw err;
    }
  }
}
