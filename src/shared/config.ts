import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const PLACEHOLDER_API_KEY = 'your-api-key-here';

export const ConfigSchema = z.object({
  gemini_api_key: z.string().default(''),

  llm: z
    .object({
      base_url: z.string().default('https://generativelanguage.googleapis.com/v1beta'),
      model: z.string().default('gemini-2.5-flash'),
      temperature: z.number().min(0).max(2).default(0.1),
      timeout_ms: z.number().int().positive().default(120000),
      thinking_budget: z.number().int().min(0).default(0),
    })
    .default({}),

  fetch: z
    .object({
      timeout_ms: z.number().int().positive().default(30000),
      user_agent: z
        .string()
        .default(
          'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
        ),
      max_text_chars: z.number().int().min(0).default(50000),
    })
    .default({}),

  retry: z
    .object({
      max_retries: z.number().int().min(1).default(3),
      retry_delay_ms: z.number().int().min(0).default(2000),
    })
    .default({}),

  run: z
    .object({
      input_file: z.string().default('urls.txt'),
      output_dir: z.string().default('.'),
      logs_dir: z.string().default('logs'),
      raw_responses_dir: z.string().default('output'),
      politeness_delay_ms: z.number().int().min(0).default(1000),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_SEARCH_PLACES = [
  'config.json',
  'faculty-scraper.config.yaml',
  'faculty-scraper.config.yml',
  '.faculty-scraperrc.yaml',
  '.faculty-scraperrc.yml',
];

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({ gemini_api_key: PLACEHOLDER_API_KEY });
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export interface LoadConfigOptions {
  configPath?: string;
  searchFrom?: string;
  force?: boolean;
}

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  if (cachedConfig && !options.force) return cachedConfig;

  const explorer = cosmiconfig('faculty-scraper', { searchPlaces: CONFIG_SEARCH_PLACES });

  const explicitPath = options.configPath ?? process.env['FACULTY_SCRAPER_CONFIG'];
  let rawConfig: Record<string, unknown> = {};

  if (explicitPath) {
    const resolved = resolvePath(explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`, { path: resolved });
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else {
    const result = await explorer.search(options.searchFrom);
    if (result) {
      logger.debug({ path: result.filepath }, 'Loaded config file');
      rawConfig = asRecord(result.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const envApiKey = process.env['GEMINI_API_KEY'];
  if (envApiKey) rawConfig['gemini_api_key'] = envApiKey;

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * The API key is the one setting without a usable default.
 */
export function requireApiKey(config: Config): string {
  const key = config.gemini_api_key.trim();
  if (!key) {
    throw new ConfigError('gemini_api_key is not set. Add it to config.json or set GEMINI_API_KEY.');
  }
  if (key === PLACEHOLDER_API_KEY) {
    throw new ConfigError('gemini_api_key still holds the placeholder value; replace it with a real key.');
  }
  return key;
}
