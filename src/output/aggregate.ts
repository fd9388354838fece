import type { Logger } from 'pino';
import { OutputError } from '../shared/errors.js';
import { logger as defaultLogger } from '../shared/logger.js';
import type { ProfessorRecord } from '../llm/parse.js';
import type { UrlOutcome } from '../engine/pipeline.js';
import { institutionKey } from './institution.js';
import type { RawResponseStore } from './rawResponse.js';

// Scanned by `summary` to count outcomes in a run log
export const OUTCOME_MARKERS = {
  ok: '[OK]',
  empty: '[EMPTY]',
  failed: '[FAILED]',
} as const;

export interface RunStats {
  urlsWithProfessors: number;
  urlsEmpty: number;
  urlsFetchFailed: number;
  urlsParseFailed: number;
  totalProfessors: number;
  rawResponseFiles: string[];
  rawResponseErrors: number;
}

export type InstitutionSheets = Map<string, ProfessorRecord[]>;

export interface AggregatorDeps {
  rawStore: RawResponseStore;
  logger?: Logger;
}

export class Aggregator {
  private readonly sheets: InstitutionSheets = new Map();
  private readonly stats: RunStats = {
    urlsWithProfessors: 0,
    urlsEmpty: 0,
    urlsFetchFailed: 0,
    urlsParseFailed: 0,
    totalProfessors: 0,
    rawResponseFiles: [],
    rawResponseErrors: 0,
  };
  private readonly rawStore: RawResponseStore;
  private readonly log: Logger;
  private finalized = false;

  constructor(deps: AggregatorDeps) {
    this.rawStore = deps.rawStore;
    this.log = deps.logger ?? defaultLogger;
  }

  record(url: string, outcome: UrlOutcome): void {
    if (this.finalized) {
      throw new OutputError('Cannot record outcomes after finalize()', { url });
    }

    switch (outcome.status) {
      case 'success': {
        const count = outcome.records.length;
        if (count === 0) {
          this.stats.urlsEmpty++;
          this.log.info({ url, count }, `${OUTCOME_MARKERS.empty} ${url} - found 0 professors`);
          return;
        }
        const key = institutionKey(url);
        const sheet = this.sheets.get(key) ?? [];
        sheet.push(...outcome.records);
        this.sheets.set(key, sheet);
        this.stats.urlsWithProfessors++;
        this.stats.totalProfessors += count;
        this.log.info({ url, count, institution: key }, `${OUTCOME_MARKERS.ok} ${url} - found ${count} professors`);
        return;
      }

      case 'fetch_failed':
        this.stats.urlsFetchFailed++;
        this.log.error(
          { url, attempts: outcome.attempts, reason: outcome.reason },
          `${OUTCOME_MARKERS.failed} fetch ${url} after ${outcome.attempts} attempts`,
        );
        return;

      case 'parse_failed': {
        this.stats.urlsParseFailed++;
        let rawFile: string | null = null;
        let rawError: string | null = null;
        if (outcome.rawResponse !== null) {
          try {
            rawFile = this.rawStore.save(url, outcome.rawResponse);
            this.stats.rawResponseFiles.push(rawFile);
          } catch (err) {
            // artifact failures never stop the run
            if (!(err instanceof OutputError)) throw err;
            rawError = err.message;
            this.stats.rawResponseErrors++;
            this.log.fatal({ url, error: err.message, ...err.details }, 'Could not save raw response');
          }
        }
        this.log.error(
          { url, attempts: outcome.attempts, reason: outcome.reason, rawFile, rawError },
          `${OUTCOME_MARKERS.failed} parse ${url} after ${outcome.attempts} attempts`,
        );
        return;
      }
    }
  }

  /**
   * Institution key to records, in URL processing order. Returns copies, so repeated calls agree.
   */
  finalize(): InstitutionSheets {
    this.finalized = true;
    return new Map(
      Array.from(this.sheets, ([key, records]): [string, ProfessorRecord[]] => [key, records.map((r) => ({ ...r }))]),
    );
  }

  getStats(): RunStats {
    return { ...this.stats, rawResponseFiles: [...this.stats.rawResponseFiles] };
  }
}
