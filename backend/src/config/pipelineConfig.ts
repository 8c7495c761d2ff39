// backend/src/config/pipelineConfig.ts

import { z } from "zod";

/**
 * Every tunable of the routing and retrieval pipeline lives here.
 * Relevance thresholds stay separate per call site on purpose: each one was
 * tuned for a different handler and must not drift together.
 */
const pipelineConfigSchema = z.object({
  routerConfidenceThreshold: z.number().min(0).max(1),
  relevance: z.object({
    qa: z.number().min(0).max(1),
    contentAgent: z.number().min(0).max(1),
    summarization: z.number().min(0).max(1),
    documentAnalysis: z.number().min(0).max(1),
  }),
  retrieval: z.object({
    topK: z.number().int().positive(),
    maxContextDocs: z.number().int().positive(),
    maxContextChars: z.number().int().positive(),
  }),
  memory: z.object({
    windowSize: z.number().int().positive(),
    historyTurns: z.number().int().nonnegative(),
  }),
  models: z.object({
    completion: z.string().min(1),
    embedding: z.string().min(1),
    embeddingDimensions: z.number().int().positive(),
  }),
  externalCallTimeoutMs: z.number().int().positive(),
  chunking: z.object({
    words: z.number().int().positive(),
    overlapWords: z.number().int().nonnegative(),
  }),
  rateLimit: z.object({
    windowMs: z.number().int().positive(),
    max: z.number().int().positive(),
  }),
});

type ParsedConfig = z.infer<typeof pipelineConfigSchema>;

type DeepReadonly<T> = { readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K] };

export type PipelineConfig = DeepReadonly<ParsedConfig>;

function freezeConfig(config: ParsedConfig): PipelineConfig {
  for (const section of Object.values(config)) {
    if (typeof section === "object" && section !== null) Object.freeze(section);
  }
  return Object.freeze(config);
}

type Env = Record<string, string | undefined>;

export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = "ConfigValidationError";
    this.invalidVars = invalidVars;
  }
}

// env var name for each config path, used to report bad values by the name the operator set
const ENV_NAMES: Record<string, string> = {
  routerConfidenceThreshold: "ROUTER_CONFIDENCE_THRESHOLD",
  "relevance.qa": "QA_RELEVANCE_THRESHOLD",
  "relevance.contentAgent": "CONTENT_AGENT_RELEVANCE_THRESHOLD",
  "relevance.summarization": "SUMMARY_RELEVANCE_THRESHOLD",
  "relevance.documentAnalysis": "DOCUMENT_ANALYSIS_THRESHOLD",
  "retrieval.topK": "RETRIEVAL_TOP_K",
  "retrieval.maxContextDocs": "CONTEXT_MAX_DOCS",
  "retrieval.maxContextChars": "CONTEXT_MAX_CHARS",
  "memory.windowSize": "MEMORY_WINDOW",
  "memory.historyTurns": "HISTORY_TURNS",
  "models.completion": "COMPLETION_MODEL",
  "models.embedding": "EMBEDDING_MODEL",
  "models.embeddingDimensions": "EMBEDDING_DIMENSIONS",
  externalCallTimeoutMs: "EXTERNAL_CALL_TIMEOUT_MS",
  "chunking.words": "CHUNK_WORDS",
  "chunking.overlapWords": "CHUNK_OVERLAP_WORDS",
  "rateLimit.windowMs": "RATE_LIMIT_WINDOW_MS",
  "rateLimit.max": "RATE_LIMIT_MAX",
};

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  return Number(value);
}

function str(value: string | undefined, fallback: string): string {
  const t = (value ?? "").trim();
  return t ? t : fallback;
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const raw = {
    routerConfidenceThreshold: num(env.ROUTER_CONFIDENCE_THRESHOLD, 0.6),
    relevance: {
      qa: num(env.QA_RELEVANCE_THRESHOLD, 0.3),
      contentAgent: num(env.CONTENT_AGENT_RELEVANCE_THRESHOLD, 0.5),
      summarization: num(env.SUMMARY_RELEVANCE_THRESHOLD, 0),
      documentAnalysis: num(env.DOCUMENT_ANALYSIS_THRESHOLD, 0.7),
    },
    retrieval: {
      topK: num(env.RETRIEVAL_TOP_K, 10),
      maxContextDocs: num(env.CONTEXT_MAX_DOCS, 5),
      maxContextChars: num(env.CONTEXT_MAX_CHARS, 5000),
    },
    memory: {
      windowSize: num(env.MEMORY_WINDOW, 50),
      historyTurns: num(env.HISTORY_TURNS, 6),
    },
    models: {
      completion: str(env.COMPLETION_MODEL, "gpt-4o-mini"),
      embedding: str(env.EMBEDDING_MODEL, "text-embedding-3-small"),
      embeddingDimensions: num(env.EMBEDDING_DIMENSIONS, 768),
    },
    externalCallTimeoutMs: num(env.EXTERNAL_CALL_TIMEOUT_MS, 20_000),
    chunking: {
      words: num(env.CHUNK_WORDS, 200),
      overlapWords: num(env.CHUNK_OVERLAP_WORDS, 30),
    },
    rateLimit: {
      windowMs: num(env.RATE_LIMIT_WINDOW_MS, 60_000),
      max: num(env.RATE_LIMIT_MAX, 120),
    },
  };

  const parsed = pipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const invalidVars = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return { name: ENV_NAMES[path] ?? path, reason: issue.message };
    });
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => v.name).join(", ")}`,
      invalidVars
    );
  }

  const { chunking } = parsed.data;
  if (chunking.overlapWords >= chunking.words) {
    throw new ConfigValidationError("Invalid configuration: CHUNK_OVERLAP_WORDS", [
      { name: "CHUNK_OVERLAP_WORDS", reason: "must be smaller than CHUNK_WORDS" },
    ]);
  }

  return freezeConfig(parsed.data);
}

let cached: PipelineConfig | null = null;

export function getPipelineConfig(): PipelineConfig {
  if (!cached) cached = loadPipelineConfig();
  return cached;
}
