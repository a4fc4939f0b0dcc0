import fetch from 'node-fetch';
import { v4 as uuid } from 'uuid';
import type { LLMSettings } from '../config/appConfig';
import { ConfigError, UpstreamError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import {
  buildLLMHeaders,
  buildLLMRequestBody,
  detectLLMProvider,
  parseLLMResponse,
  type LLMProvider,
} from './llmProvider';

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

export interface LLMCompletionOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  // Log category of the caller
  category?: string;
}

export interface LLMClient {
  complete(prompt: string, options?: LLMCompletionOptions): Promise<string>;
}

function isOverloaded(status: number, body: string): boolean {
  return status === 503 || status === 529 || /overload/i.test(body);
}

export class HttpLLMClient implements LLMClient {
  private readonly provider: LLMProvider | null;

  constructor(
    private readonly settings: LLMSettings | null,
    private readonly retryDelayMs = 2000
  ) {
    this.provider = settings ? detectLLMProvider(settings.apiUrl, settings.apiKey) : null;
  }

  async complete(prompt: string, options: LLMCompletionOptions = {}): Promise<string> {
    if (!this.settings || !this.provider) {
      throw new ConfigError('LLM_API_URL or LLM_API_KEY not configured');
    }

    const { apiUrl, apiKey, model } = this.settings;
    const provider = this.provider;
    const category = options.category ?? 'LLM';
    const transactionId = `llm-${uuid()}`;
    const headers = buildLLMHeaders(provider, apiKey);
    const body = buildLLMRequestBody(provider, { apiUrl, apiKey, model }, {
      prompt,
      systemPrompt: options.systemPrompt,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    });

    const send = () =>
      fetch(apiUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
      });

    let response: FetchResponse;
    try {
      response = await send();
    } catch (err) {
      throw new UpstreamError(`LLM request failed: ${errorMessage(err)}`);
    }
    let raw = await response.text();

    if (!response.ok && isOverloaded(response.status, raw)) {
      await Logger.logInfo(category, 'Retrying after overload', {
        TransactionID: transactionId,
        Endpoint: apiUrl,
        Status: 'RETRY',
      });
      // Retry once for overloaded services
      await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
      try {
        response = await send();
      } catch (err) {
        throw new UpstreamError(`LLM retry failed: ${errorMessage(err)}`);
      }
      raw = await response.text();
    }

    if (!response.ok) {
      await Logger.logBackendError(category, new Error(`LLM request failed with status ${response.status}`), {
        TransactionID: transactionId,
        Endpoint: apiUrl,
        Status: 'LLM_ERROR',
        ResponsePayload: raw.slice(0, 500),
      });
      throw new UpstreamError(`LLM request failed with status ${response.status}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new UpstreamError('LLM returned a non-JSON response body');
    }

    const text = parseLLMResponse(provider, json);
    if (!text.trim()) {
      throw new UpstreamError('LLM returned an empty response');
    }
    return text;
  }
}
