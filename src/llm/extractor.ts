import { logger } from '../shared/logger.js';
import type { GeminiClient } from './client.js';
import { buildExtractionPrompt } from './prompts.js';
import { parseProfessorCsv, type ProfessorRecord } from './parse.js';

export interface Extraction {
  records: ProfessorRecord[];
  rawResponse: string;
}

/**
 * Model query and response parsing as one operation, so a retry always
 * re-queries the model. Throws ServiceError or ParseError.
 */
export interface ProfessorExtractor {
  extract(cleanText: string, url: string): Promise<Extraction>;
}

export class GeminiExtractor implements ProfessorExtractor {
  constructor(private readonly client: Pick<GeminiClient, 'generate'>) {}

  async extract(cleanText: string, url: string): Promise<Extraction> {
    const prompt = buildExtractionPrompt({ url, content: cleanText });
    const response = await this.client.generate(prompt);
    logger.debug({ url, chars: response.content.length, tokens: response.token_count }, 'Model response received');
    const records = await parseProfessorCsv(response.content);
    return { records, rawResponse: response.content };
  }
}
