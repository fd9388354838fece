#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import {
  loadConfig,
  requireApiKey,
  writeDefaultConfig,
  type Config,
} from '../shared/config.js';
import { ScraperError, errorMessage } from '../shared/errors.js';
import { createRunLogger } from '../shared/logger.js';
import { resolvePath, timestampSlug } from '../shared/utils.js';
import { PageFetcher } from '../source/fetch.js';
import { readUrlList } from '../source/urlList.js';
import { GeminiClient } from '../llm/client.js';
import { GeminiExtractor } from '../llm/extractor.js';
import { FileRawResponseStore } from '../output/rawResponse.js';
import { summarizeLogFile } from '../output/logSummary.js';
import { defaultOutputFile, runScrape } from '../engine/run.js';
import { retryPolicyFromConfig } from '../engine/orchestrator.js';

const program = new Command();

program
  .name('faculty-scraper')
  .description('Extract professor lists from university faculty pages with Gemini')
  .version('1.0.0');

function createClient(config: Config): GeminiClient {
  return new GeminiClient({ ...config.llm, api_key: requireApiKey(config) });
}

function reportFatal(err: unknown): void {
  log(`✗ ${errorMessage(err)}`);
  if (err instanceof ScraperError && err.details) {
    log(`  ${JSON.stringify(err.details)}`);
  }
  process.exitCode = 1;
}

// === run ===
program
  .command('run', { isDefault: true })
  .description('Process every URL in the input list and write the workbook')
  .option('-i, --input <file>', 'newline-separated URL list')
  .option('-o, --output <file>', 'workbook path (default: professors_<timestamp>.xlsx)')
  .option('-c, --config <file>', 'config file path')
  .action(async (opts: { input?: string; output?: string; config?: string }) => {
    try {
      const config = await loadConfig({ configPath: opts.config });
      const client = createClient(config);
      const urls = readUrlList(resolvePath(opts.input ?? config.run.input_file));

      const logFile = path.join(resolvePath(config.run.logs_dir), `scraper_${timestampSlug()}.log`);
      const runLogger = createRunLogger(logFile);
      const outputFile = opts.output
        ? resolvePath(opts.output)
        : defaultOutputFile(resolvePath(config.run.output_dir));

      const result = await runScrape(
        urls,
        {
          fetcher: new PageFetcher(config.fetch),
          extractor: new GeminiExtractor(client),
          rawStore: new FileRawResponseStore(resolvePath(config.run.raw_responses_dir)),
          verifyCredentials: () => client.verifyCredentials(),
          logger: runLogger,
        },
        {
          policy: retryPolicyFromConfig(config.retry),
          outputFile,
          politenessDelayMs: config.run.politeness_delay_ms,
        },
      );

      const { stats } = result;
      const failed = stats.urlsFetchFailed + stats.urlsParseFailed;
      log('');
      log(`✓ URLs with professors: ${stats.urlsWithProfessors}/${urls.length}`);
      log(`○ URLs with no professors: ${stats.urlsEmpty}/${urls.length}`);
      log(`✗ URLs with errors: ${failed}/${urls.length}`);
      log(`Total professors extracted: ${stats.totalProfessors}`);
      if (result.outputFile) log(`Output saved to: ${result.outputFile}`);
      for (const file of stats.rawResponseFiles) log(`⚠ Raw response saved to: ${file}`);
      if (stats.rawResponseErrors > 0) log(`⚠ Raw responses that could not be saved: ${stats.rawResponseErrors}`);
      log(`Log saved to: ${logFile}`);
    } catch (err) {
      reportFatal(err);
    }
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, input file and Gemini credentials')
  .option('-i, --input <file>', 'newline-separated URL list')
  .option('-c, --config <file>', 'config file path')
  .action(async (opts: { input?: string; config?: string }) => {
    const results: string[] = [];
    let healthy = true;
    let config: Config | null = null;

    try {
      const loaded = await loadConfig({ configPath: opts.config });
      requireApiKey(loaded);
      config = loaded;
      results.push('Config: ok');
    } catch (err) {
      healthy = false;
      results.push(`Config: error (${errorMessage(err)})`);
    }

    try {
      const urls = readUrlList(resolvePath(opts.input ?? config?.run.input_file ?? 'urls.txt'));
      if (urls.length === 0) healthy = false;
      results.push(`Input: ${urls.length} URLs`);
    } catch (err) {
      healthy = false;
      results.push(`Input: error (${errorMessage(err)})`);
    }

    if (config) {
      try {
        await createClient(config).verifyCredentials();
        results.push('Gemini: ok');
      } catch (err) {
        healthy = false;
        results.push(`Gemini: error (${errorMessage(err)})`);
      }
    } else {
      results.push('Gemini: skipped');
    }

    log(`${healthy ? '✓' : '✗'} ${results.join(' | ')}`);
    if (!healthy) process.exitCode = 1;
  });

// === init ===
program
  .command('init')
  .description('Write a default config file with a placeholder API key')
  .option('-p, --path <file>', 'where to write the config', 'faculty-scraper.config.yaml')
  .action((opts: { path: string }) => {
    const configPath = resolvePath(opts.path);
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created; set gemini_api_key before running`);
  });

// === summary ===
program
  .command('summary <logFile>')
  .description('Count successes, empty pages and failures in a run log')
  .action((logFile: string) => {
    try {
      const summary = summarizeLogFile(resolvePath(logFile));
      log(`✓ ok: ${summary.ok} | ○ empty: ${summary.empty} | ✗ failed: ${summary.failed}`);
      for (const url of summary.failedUrls) log(`  ✗ ${url}`);
    } catch (err) {
      reportFatal(err);
    }
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

await program.parseAsync();
