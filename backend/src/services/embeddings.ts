// services/embeddings.ts
// Embedding provider over an OpenAI-compatible /embeddings endpoint

import type { EmbeddingProvider } from "../guard/types";

// ── API types ──

interface EmbeddingsResponse {
  data: Array<{ embedding: number[]; index: number }>;
}

function isEmbeddingsResponse(value: unknown): value is EmbeddingsResponse {
  if (typeof value !== "object" || value === null || !("data" in value) || !Array.isArray(value.data)) {
    return false;
  }
  return value.data.every(
    (d: unknown) =>
      typeof d === "object" && d !== null && "embedding" in d && Array.isArray(d.embedding) &&
      d.embedding.every((n: unknown) => typeof n === "number"),
  );
}

export class EmbeddingProviderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmbeddingProviderError";
  }
}

export interface HttpEmbeddingOptions {
  url: string;
  apiKey?: string;
  model: string;
  timeoutMs?: number;
}

export function createHttpEmbeddingProvider(options: HttpEmbeddingOptions): EmbeddingProvider {
  return {
    async embed(text: string): Promise<number[]> {
      const headers: Record<string, string> = { "Content-Type": "application/json" };
      if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;

      const response = await fetch(options.url, {
        method: "POST",
        headers,
        body: JSON.stringify({ model: options.model, input: text }),
        signal: AbortSignal.timeout(options.timeoutMs ?? 5000),
      });

      if (!response.ok) {
        console.error(`[embeddings] API returned ${response.status}`);
        throw new EmbeddingProviderError(`Embedding API returned ${response.status}`);
      }

      const data: unknown = await response.json();
      if (!isEmbeddingsResponse(data) || data.data.length === 0) {
        throw new EmbeddingProviderError("Embedding API returned an unexpected payload");
      }
      return data.data[0].embedding;
    },
  };
}
