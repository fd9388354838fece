import { logger } from '../shared/logger.js';
import { ServiceError, errorMessage, type ServiceErrorKind } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
  finish_reason: string | null;
}

// Gemini generateContent response shape (partial)
interface GeminiResponse {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  modelVersion?: string;
  usageMetadata?: { totalTokenCount?: number };
}

export type GeminiClientOptions = Config['llm'] & {
  api_key: string;
};

/**
 * Map an HTTP failure from the Gemini API onto the service error taxonomy.
 * An invalid key comes back as 400 INVALID_ARGUMENT with reason API_KEY_INVALID.
 */
export function classifyHttpFailure(status: number, body: string): ServiceErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429 || /RESOURCE_EXHAUSTED/.test(body)) return 'quota';
  if (status === 400 && /API_KEY_INVALID|API key not valid/i.test(body)) return 'auth';
  return 'transient';
}

export class GeminiClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly thinkingBudget: number;

  constructor(options: GeminiClientOptions) {
    this.baseUrl = options.base_url.replace(/\/+$/, '');
    this.apiKey = options.api_key;
    this.model = options.model;
    this.temperature = options.temperature;
    this.timeoutMs = options.timeout_ms;
    this.thinkingBudget = options.thinking_budget;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async generate(prompt: string): Promise<LlmResponse> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`;
    const body = JSON.stringify({
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: {
        temperature: this.temperature,
        thinkingConfig: { thinkingBudget: this.thinkingBudget },
      },
    });

    const response = await this.send(url, { method: 'POST', body });

    let data: GeminiResponse;
    try {
      data = (await response.json()) as GeminiResponse;
    } catch {
      throw new ServiceError('Gemini response is not valid JSON', 'transient', { model: this.model });
    }

    const candidate = data.candidates?.[0];
    const content = (candidate?.content?.parts ?? []).map((p) => p.text ?? '').join('');
    if (!content.trim()) {
      throw new ServiceError('Gemini returned empty content', 'transient', {
        finish_reason: candidate?.finishReason ?? null,
      });
    }

    const tokenCount = data.usageMetadata?.totalTokenCount ?? 0;
    logger.debug({ model: data.modelVersion ?? this.model, tokens: tokenCount }, 'Gemini call completed');

    return {
      content,
      model: data.modelVersion ?? this.model,
      token_count: tokenCount,
      finish_reason: candidate?.finishReason ?? null,
    };
  }

  /**
   * Cheap authenticated request used to reject a bad key before any page is processed.
   */
  async verifyCredentials(): Promise<void> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(this.model)}`;
    await this.send(url, { method: 'GET' });
  }

  private async send(url: string, init: { method: 'GET' | 'POST'; body?: string }): Promise<Response> {
    if (!this.isConfigured()) {
      throw new ServiceError('Gemini API key is missing', 'auth');
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: init.method,
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey,
        },
        body: init.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'TimeoutError';
      throw new ServiceError(
        timedOut ? `Gemini request timed out after ${this.timeoutMs}ms` : `Gemini request failed: ${errorMessage(err)}`,
        'transient',
        { model: this.model },
      );
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      const kind = classifyHttpFailure(response.status, text);
      throw new ServiceError(`Gemini API error: ${response.status} ${response.statusText}`.trim(), kind, {
        status: response.status,
        body: text.slice(0, 500),
        model: this.model,
      });
    }

    return response;
  }
}
