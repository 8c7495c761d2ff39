// backend/src/ai/clients.ts
// Model capabilities are injected through these small shapes so every
// pipeline stage can be exercised with a stub.

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = { role: ChatRole; content: string };

export type CompletionOptions = {
  temperature?: number;
  maxOutputTokens?: number;
};

export type CompletionClient = {
  /** throws ExternalCallError on failure or timeout */
  complete: (input: string | ChatMessage[], opts?: CompletionOptions) => Promise<string>;
};

export type EmbeddingClient = {
  readonly dimensions: number;
  embedQuery: (text: string) => Promise<number[]>;
  embedDocuments: (texts: string[]) => Promise<number[][]>;
};
