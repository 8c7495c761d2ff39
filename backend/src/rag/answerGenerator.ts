// backend/src/rag/answerGenerator.ts

import { z } from "zod";
import type { CompletionClient } from "../ai/clients";
import { parseJsonObject } from "../ai/jsonBlock";
import { buildAnswerUserMessage, type AnswerPromptInput } from "../ai/prompts/answerPrompts";
import { errorMessage } from "../utils/errors";
import { logWarn } from "../utils/logger";

export type AnswerMode = "text" | "json" | "schema";

/** Never throws: failures come back as a well-formed result in the generator's own shape. */
export type AnswerGenerator<T> = {
  mode: AnswerMode;
  generate: (input: AnswerPromptInput) => Promise<T>;
  render: (answer: T) => string;
};

type GeneratorDeps = {
  completion: CompletionClient;
  instructions: string;
  temperature?: number;
  maxOutputTokens?: number;
};

async function run(deps: GeneratorDeps, input: AnswerPromptInput): Promise<string> {
  return deps.completion.complete(
    [
      { role: "system", content: deps.instructions },
      { role: "user", content: buildAnswerUserMessage(input) },
    ],
    { temperature: deps.temperature ?? 0.2, maxOutputTokens: deps.maxOutputTokens ?? 900 }
  );
}

export function textErrorMessage(err: unknown): string {
  return `I'm sorry, I encountered an error while processing your question: ${errorMessage(err)}`;
}

export function createTextAnswerGenerator(deps: GeneratorDeps): AnswerGenerator<string> {
  return {
    mode: "text",
    async generate(input) {
      try {
        const text = (await run(deps, input)).trim();
        return text || textErrorMessage("empty model response");
      } catch (err) {
        logWarn("answer_generation_failed", err, { mode: "text" });
        return textErrorMessage(err);
      }
    },
    render: (answer) => answer,
  };
}

const jsonAnswerSchema = z.object({
  response: z.string(),
  sources_referenced: z.array(z.string()).default([]),
  confidence: z.enum(["high", "medium", "low"]).catch("medium"),
});

export type JsonAnswer = {
  response: string;
  sourcesReferenced: string[];
  confidence: "high" | "medium" | "low";
};

export function createJsonAnswerGenerator(deps: GeneratorDeps): AnswerGenerator<JsonAnswer> {
  return {
    mode: "json",
    async generate(input) {
      let raw: string;
      try {
        raw = await run(deps, input);
      } catch (err) {
        logWarn("answer_generation_failed", err, { mode: "json" });
        return { response: textErrorMessage(err), sourcesReferenced: [], confidence: "low" };
      }
      const parsed = jsonAnswerSchema.safeParse(parseJsonObject(raw));
      if (parsed.success) {
        return {
          response: parsed.data.response,
          sourcesReferenced: parsed.data.sources_referenced,
          confidence: parsed.data.confidence,
        };
      }
      // prose instead of JSON is still an answer, just a less trusted one
      const text = raw.trim();
      return {
        response: text || textErrorMessage("empty model response"),
        sourcesReferenced: [],
        confidence: "low",
      };
    },
    render: (answer) => answer.response,
  };
}

export type SchemaGeneratorOptions<T> = {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** used when the model replied with something that does not fit the schema */
  fromUnstructured: (raw: string) => T;
  onError: (message: string) => T;
  render: (answer: T) => string;
};

export function createSchemaAnswerGenerator<T>(
  deps: GeneratorDeps,
  options: SchemaGeneratorOptions<T>
): AnswerGenerator<T> {
  return {
    mode: "schema",
    async generate(input) {
      let raw: string;
      try {
        raw = await run(deps, input);
      } catch (err) {
        logWarn("answer_generation_failed", err, { mode: "schema", schema: options.name });
        return options.onError(errorMessage(err));
      }
      const parsed = options.schema.safeParse(parseJsonObject(raw));
      return parsed.success ? parsed.data : options.fromUnstructured(raw);
    },
    render: options.render,
  };
}
