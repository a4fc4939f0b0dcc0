/**
 * LLM provider detection and request/response shaping.
 * Detects OpenAI, Google Gemini or Anthropic Claude from the API URL or key format
 * so the rest of the code can talk to any of them through one interface.
 */

export type LLMProvider = 'openai' | 'google' | 'anthropic';

export interface LLMRequestConfig {
  apiUrl: string;
  apiKey: string;
  model?: string;
}

export interface LLMRequestOptions {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export type LLMRequestBody = Record<string, unknown>;

/**
 * Detects LLM provider based on API URL or API key format
 */
export function detectLLMProvider(apiUrl: string, apiKey: string): LLMProvider {
  const urlLower = apiUrl.toLowerCase();

  // URL first, it is the most reliable signal
  if (urlLower.includes('openai') || urlLower.includes('azure.com')) {
    return 'openai';
  }
  if (urlLower.includes('anthropic') || urlLower.includes('claude')) {
    return 'anthropic';
  }
  if (urlLower.includes('google') || urlLower.includes('gemini') || urlLower.includes('generativelanguage.googleapis.com')) {
    return 'google';
  }

  // Key format: OpenAI 'sk-', Anthropic 'sk-ant-'
  if (apiKey.startsWith('sk-ant-')) {
    return 'anthropic';
  }
  if (apiKey.startsWith('sk-')) {
    return 'openai';
  }

  return 'google';
}

export function buildLLMHeaders(provider: LLMProvider, apiKey: string): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };

  if (provider === 'openai') {
    headers['Authorization'] = `Bearer ${apiKey}`;
  } else if (provider === 'anthropic') {
    headers['x-api-key'] = apiKey;
    headers['anthropic-version'] = '2023-06-01';
  } else {
    headers['x-goog-api-key'] = apiKey;
  }

  return headers;
}

export function buildLLMRequestBody(
  provider: LLMProvider,
  config: LLMRequestConfig,
  options: LLMRequestOptions
): LLMRequestBody {
  const { model } = config;
  const { prompt, systemPrompt, maxTokens = 4096, temperature } = options;

  if (provider === 'openai') {
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    return {
      model: model ?? 'gpt-4o-mini',
      messages,
      max_tokens: maxTokens,
      ...(temperature !== undefined ? { temperature } : {}),
    };
  }

  if (provider === 'anthropic') {
    return {
      model: model ?? 'claude-3-5-sonnet-20241022',
      max_tokens: maxTokens,
      ...(systemPrompt ? { system: systemPrompt } : {}),
      ...(temperature !== undefined ? { temperature } : {}),
      messages: [
        {
          role: 'user',
          content: [{ type: 'text', text: prompt }],
        },
      ],
    };
  }

  // Google Gemini
  return {
    ...(model ? { model } : {}),
    ...(systemPrompt ? { systemInstruction: { parts: [{ text: systemPrompt }] } } : {}),
    generationConfig: {
      maxOutputTokens: maxTokens,
      ...(temperature !== undefined ? { temperature } : {}),
    },
    contents: [
      {
        role: 'user',
        parts: [{ text: prompt }],
      },
    ],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Pulls the generated text out of a provider response body
 */
export function parseLLMResponse(provider: LLMProvider, json: unknown): string {
  if (!isRecord(json)) return '';

  if (provider === 'openai') {
    // { choices: [{ message: { content: "..." } }] }
    for (const choice of asArray(json.choices)) {
      if (isRecord(choice) && isRecord(choice.message) && typeof choice.message.content === 'string' && choice.message.content) {
        return choice.message.content;
      }
    }
    return '';
  }

  if (provider === 'anthropic') {
    // { content: [{ type: "text", text: "..." }] }
    let textContent = '';
    for (const item of asArray(json.content)) {
      if (isRecord(item) && item.type === 'text' && typeof item.text === 'string') {
        textContent += item.text;
      }
    }
    return textContent;
  }

  for (const candidate of asArray(json.candidates)) {
    if (!isRecord(candidate)) continue;
    const contentParts = isRecord(candidate.content) ? asArray(candidate.content.parts) : [];
    const outputParts = isRecord(candidate.output) ? asArray(candidate.output.parts) : [];

    for (const part of [...contentParts, ...outputParts]) {
      if (isRecord(part) && typeof part.text === 'string') {
        return part.text;
      }
    }
  }
  return '';
}
