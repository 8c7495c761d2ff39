// backend/src/routing/subRouter.ts

import type { CompletionClient } from "../ai/clients";
import { parseJsonObject } from "../ai/jsonBlock";
import type { SubRouteDecision } from "../types";
import { logWarn } from "../utils/logger";
import { pickFromVocabulary, readConfidence, readDetails } from "./confidence";

export type SubRouterSpec<T extends string> = {
  name: string;
  prompt: string;
  vocabulary: readonly T[];
  aliases?: Partial<Record<string, T>>;
  fields: { type: string; confidence: string; details: string };
  clarification: string;
};

export type SubRouterDeps = {
  completion: CompletionClient;
  /** must match the intent classifier's threshold */
  threshold: number;
};

export const UNPARSEABLE_ROUTE_DETAILS = "No JSON found or invalid LLM output.";

/**
 * One closed vocabulary, one prompt. Unparseable output, a type outside the
 * vocabulary or low confidence all resolve to "unknown" with the
 * clarification message.
 */
export function createSubRouter<T extends string>(spec: SubRouterSpec<T>, deps: SubRouterDeps) {
  return async function route(utterance: string): Promise<SubRouteDecision<T>> {
    const text = String(utterance || "").trim();
    if (!text) {
      return { type: "unknown", confidence: 0, details: spec.clarification, overridden: true, raw: {} };
    }

    let output = "";
    try {
      output = await deps.completion.complete(
        [
          { role: "system", content: spec.prompt },
          { role: "user", content: text },
        ],
        { temperature: 0, maxOutputTokens: 200 }
      );
    } catch (err) {
      logWarn(`${spec.name}_failed`, err);
    }

    const raw = parseJsonObject(output);
    if (Object.keys(raw).length === 0) {
      return { type: "unknown", confidence: 0, details: UNPARSEABLE_ROUTE_DETAILS, overridden: true, raw };
    }

    const type = pickFromVocabulary(raw[spec.fields.type], spec.vocabulary, spec.aliases);
    const confidence = readConfidence(raw[spec.fields.confidence]);

    if (!type || confidence < deps.threshold) {
      return { type: "unknown", confidence, details: spec.clarification, overridden: true, raw };
    }

    return { type, confidence, details: readDetails(raw[spec.fields.details]), overridden: false, raw };
  };
}
