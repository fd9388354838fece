import path from 'node:path';
import type { Logger } from 'pino';
import { errorMessage } from '../shared/errors.js';
import { logger as defaultLogger } from '../shared/logger.js';
import { sleep as defaultSleep, timestampSlug } from '../shared/utils.js';
import type { PageSource } from '../source/fetch.js';
import type { ProfessorExtractor } from '../llm/extractor.js';
import { Aggregator, type InstitutionSheets, type RunStats } from '../output/aggregate.js';
import type { RawResponseStore } from '../output/rawResponse.js';
import { writeWorkbook } from '../output/workbook.js';
import { RetryOrchestrator } from './orchestrator.js';
import type { RetryPolicy } from './pipeline.js';

export interface ScrapeDeps {
  fetcher: PageSource;
  extractor: ProfessorExtractor;
  rawStore: RawResponseStore;
  /** Rejects a bad credential before any URL is processed. */
  verifyCredentials?: () => Promise<void>;
  writeSheets?: (sheets: InstitutionSheets, filePath: string) => Promise<string[]>;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface ScrapeOptions {
  policy: RetryPolicy;
  outputFile: string;
  politenessDelayMs?: number;
}

export interface ScrapeResult {
  stats: RunStats;
  sheets: InstitutionSheets;
  sheetNames: string[];
  outputFile: string | null;
  durationMs: number;
}

export function defaultOutputFile(dir: string, at: Date = new Date()): string {
  return path.join(dir, `professors_${timestampSlug(at)}.xlsx`);
}

async function processAll(
  urls: readonly string[],
  deps: ScrapeDeps,
  options: ScrapeOptions,
  log: Logger,
  sleep: (ms: number) => Promise<void>,
): Promise<Aggregator> {
  const politenessDelayMs = options.politenessDelayMs ?? 0;

  if (deps.verifyCredentials) {
    await deps.verifyCredentials();
    log.info('Gemini credentials accepted');
  }

  const orchestrator = new RetryOrchestrator({
    fetcher: deps.fetcher,
    extractor: deps.extractor,
    policy: options.policy,
    sleep,
    logger: log,
  });
  const aggregator = new Aggregator({ rawStore: deps.rawStore, logger: log });

  log.info({ count: urls.length }, `Found ${urls.length} URLs to process`);

  for (const [index, url] of urls.entries()) {
    log.info({ url, position: index + 1, total: urls.length }, `[${index + 1}/${urls.length}] ${url}`);
    const outcome = await orchestrator.process(url);
    aggregator.record(url, outcome);

    if (index < urls.length - 1 && politenessDelayMs > 0) {
      await sleep(politenessDelayMs);
    }
  }

  return aggregator;
}

/**
 * Process every URL in order, then write the workbook once.
 * A ServiceError of kind auth propagates and nothing is written.
 */
export async function runScrape(urls: readonly string[], deps: ScrapeDeps, options: ScrapeOptions): Promise<ScrapeResult> {
  const startTime = Date.now();
  const log = deps.logger ?? defaultLogger;
  const sleep = deps.sleep ?? defaultSleep;
  const writeSheets = deps.writeSheets ?? writeWorkbook;

  let aggregator: Aggregator;
  try {
    aggregator = await processAll(urls, deps, options, log, sleep);
  } catch (err) {
    log.fatal({ err }, `Run aborted: ${errorMessage(err)}`);
    throw err;
  }

  const sheets = aggregator.finalize();
  const stats = aggregator.getStats();

  let sheetNames: string[] = [];
  let outputFile: string | null = null;
  if (sheets.size > 0) {
    sheetNames = await writeSheets(sheets, options.outputFile);
    outputFile = options.outputFile;
    log.info({ path: outputFile, sheets: sheetNames }, `Output saved to ${outputFile}`);
  } else {
    log.warn('No professors extracted; workbook not written');
  }

  const durationMs = Date.now() - startTime;
  log.info(
    {
      withProfessors: stats.urlsWithProfessors,
      empty: stats.urlsEmpty,
      fetchFailed: stats.urlsFetchFailed,
      parseFailed: stats.urlsParseFailed,
      totalProfessors: stats.totalProfessors,
      durationMs,
    },
    'Batch processing complete',
  );

  return { stats, sheets, sheetNames, outputFile, durationMs };
}
