import fetch from 'node-fetch';
import { ConfigError, UpstreamError } from '../utils/errors';

export interface EmbeddingClient {
  embed(text: string): Promise<number[]>;
}

export interface EmbeddingSettings {
  apiUrl: string;
  apiKey: string;
  model: string;
}

// OpenAI-compatible /embeddings endpoint
export class HttpEmbeddingClient implements EmbeddingClient {
  constructor(private readonly settings: EmbeddingSettings | null) {}

  async embed(text: string): Promise<number[]> {
    if (!this.settings) {
      throw new ConfigError('EMBEDDING_API_KEY not configured');
    }

    const response = await fetch(this.settings.apiUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.settings.apiKey}`,
      },
      body: JSON.stringify({ model: this.settings.model, input: text.slice(0, 8000) }),
    });

    const raw = await response.text();
    if (!response.ok) {
      throw new UpstreamError(`Embedding request failed with status ${response.status}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new UpstreamError('Embedding service returned invalid JSON');
    }

    const vector = readEmbedding(json);
    if (!vector) {
      throw new UpstreamError('Embedding response did not contain a vector');
    }
    return vector;
  }
}

function readEmbedding(json: unknown): number[] | null {
  if (typeof json !== 'object' || json === null || !('data' in json) || !Array.isArray(json.data)) {
    return null;
  }
  const first: unknown = json.data[0];
  if (typeof first !== 'object' || first === null || !('embedding' in first) || !Array.isArray(first.embedding)) {
    return null;
  }
  const values: unknown[] = first.embedding;
  const vector = values.filter((v): v is number => typeof v === 'number');
  return vector.length > 0 && vector.length === values.length ? vector : null;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

const STOP_WORDS = new Set(['a', 'an', 'the', 'and', 'or', 'of', 'to', 'in', 'on', 'for', 'with', 'you', 'your', 'me', 'i', 'my', 'is', 'are', 'was', 'how', 'what', 'about', 'tell', 'do', 'did', 'time']);

export function tokenize(text: string): Set<string> {
  const tokens = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}+#]+/u)
    .filter((token) => token.length > 1 && !STOP_WORDS.has(token));
  return new Set(tokens);
}

export function jaccardSimilarity(a: string, b: string): number {
  const left = tokenize(a);
  const right = tokenize(b);
  if (left.size === 0 || right.size === 0) return 0;
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared += 1;
  }
  return shared / (left.size + right.size - shared);
}
