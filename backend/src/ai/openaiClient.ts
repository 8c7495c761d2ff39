// src/ai/openaiClient.ts

import OpenAI from "openai";
import type { PipelineConfig } from "../config/pipelineConfig";
import { DimensionMismatchError, ExternalCallError } from "../utils/errors";
import type { ChatMessage, CompletionClient, CompletionOptions, EmbeddingClient } from "./clients";

let client: OpenAI | null = null;

function getClient(): OpenAI {
  if (!client) {
    if (!process.env.OPENAI_API_KEY) {
      throw new Error("OPENAI_API_KEY is not set");
    }
    client = new OpenAI({
      apiKey: process.env.OPENAI_API_KEY,
    });
  }
  return client;
}

function toMessages(input: string | ChatMessage[]): ChatMessage[] {
  return typeof input === "string" ? [{ role: "user", content: input }] : input;
}

export function createOpenAICompletionClient(
  config: Pick<PipelineConfig, "models" | "externalCallTimeoutMs">
): CompletionClient {
  return {
    async complete(input: string | ChatMessage[], opts?: CompletionOptions): Promise<string> {
      try {
        const response = await getClient().responses.create(
          {
            model: config.models.completion,
            input: toMessages(input).map((m) => ({ role: m.role, content: m.content })),
            temperature: typeof opts?.temperature === "number" ? opts.temperature : 0,
            max_output_tokens: typeof opts?.maxOutputTokens === "number" ? opts.maxOutputTokens : 800,
          },
          // no automatic retries anywhere in the pipeline
          { timeout: config.externalCallTimeoutMs, maxRetries: 0 }
        );
        return response.output_text || "";
      } catch (err) {
        throw new ExternalCallError("completion", err);
      }
    },
  };
}

export function createOpenAIEmbeddingClient(
  config: Pick<PipelineConfig, "models" | "externalCallTimeoutMs">
): EmbeddingClient {
  const dimensions = config.models.embeddingDimensions;

  async function embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    let vectors: number[][];
    try {
      const res = await getClient().embeddings.create(
        { model: config.models.embedding, input: texts, dimensions },
        { timeout: config.externalCallTimeoutMs, maxRetries: 0 }
      );
      vectors = [...res.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (err) {
      throw new ExternalCallError("embedding", err);
    }
    for (const v of vectors) {
      if (v.length !== dimensions) throw new DimensionMismatchError(dimensions, v.length);
    }
    return vectors;
  }

  return {
    dimensions,
    async embedQuery(text: string): Promise<number[]> {
      const [vector] = await embed([text]);
      if (!vector) throw new ExternalCallError("embedding", new Error("empty embedding response"));
      return vector;
    },
    embedDocuments: embed,
  };
}
