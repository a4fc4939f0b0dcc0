import fetch, { Response } from 'node-fetch';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { HttpLLMClient } from '../src/services/llmClient';
import { Logger } from '../src/utils/Logger';
import { MemoryLogSink } from './support/fakes';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

const settings = {
  apiUrl: 'https://api.openai.com/v1/chat/completions',
  apiKey: 'test-key',
  model: 'gpt-test',
};

const completion = (content: string) =>
  new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });

describe('HttpLLMClient', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('needs settings', async () => {
    await expect(new HttpLLMClient(null).complete('hi')).rejects.toThrow('LLM_API_URL or LLM_API_KEY not configured');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts the prompt and returns the completion text', async () => {
    fetchMock.mockResolvedValueOnce(completion('Hello there'));

    const text = await new HttpLLMClient(settings).complete('Say hello', { maxTokens: 50 });

    expect(text).toBe('Hello there');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(settings.apiUrl);
    expect(init?.method).toBe('POST');
  });

  it('retries once when the provider is overloaded', async () => {
    const logs = new MemoryLogSink();
    Logger.useSinks(logs);
    fetchMock
      .mockResolvedValueOnce(new Response('Service overloaded', { status: 503 }))
      .mockResolvedValueOnce(completion('Second try'));

    const text = await new HttpLLMClient(settings, 0).complete('Say hello');

    expect(text).toBe('Second try');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(logs.statuses()).toEqual(['RETRY']);
  });

  it('reports HTTP failures without retrying', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"error":"bad request"}', { status: 400 }));
    await expect(new HttpLLMClient(settings, 0).complete('x')).rejects.toThrow('LLM request failed with status 400');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports unreadable and empty bodies', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>gateway</html>', { status: 200 }));
    await expect(new HttpLLMClient(settings).complete('x')).rejects.toThrow('LLM returned a non-JSON response body');

    fetchMock.mockResolvedValueOnce(completion('   '));
    await expect(new HttpLLMClient(settings).complete('x')).rejects.toThrow('LLM returned an empty response');
  });

  it('wraps network errors', async () => {
    fetchMock.mockRejectedValueOnce(new Error('socket hang up'));
    await expect(new HttpLLMClient(settings).complete('x')).rejects.toThrow('LLM request failed: socket hang up');
  });
});
