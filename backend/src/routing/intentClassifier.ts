// backend/src/routing/intentClassifier.ts

import type { CompletionClient } from "../ai/clients";
import { parseJsonObject } from "../ai/jsonBlock";
import { INTENT_PROMPT } from "../ai/prompts/routingPrompts";
import { INTENT_TYPES, type IntentDecision } from "../types";
import { logWarn } from "../utils/logger";
import { pickFromVocabulary, readConfidence, readDetails } from "./confidence";

export type IntentClassifierDeps = {
  completion: CompletionClient;
  threshold: number;
};

export const UNPARSEABLE_INTENT_DETAILS = "No JSON found or invalid LLM output.";
export const AMBIGUOUS_INTENT_DETAILS = "Intent was ambiguous. Routed to general chat for user clarification.";
export const EMPTY_INTENT_DETAILS = "Empty message. Routed to general chat.";

/**
 * action vs query. Anything the gate cannot trust degrades to "query",
 * the general path, instead of failing the request.
 */
export async function classifyIntent(utterance: string, deps: IntentClassifierDeps): Promise<IntentDecision> {
  const text = String(utterance || "").trim();
  if (!text) {
    return { intentType: "query", intentConfidence: 0, intentDetails: EMPTY_INTENT_DETAILS, overridden: true };
  }

  let output = "";
  try {
    output = await deps.completion.complete(
      [
        { role: "system", content: INTENT_PROMPT },
        { role: "user", content: text },
      ],
      { temperature: 0, maxOutputTokens: 120 }
    );
  } catch (err) {
    logWarn("intent_classifier_failed", err);
  }

  const parsed = parseJsonObject(output);
  if (Object.keys(parsed).length === 0) {
    return { intentType: "query", intentConfidence: 0, intentDetails: UNPARSEABLE_INTENT_DETAILS, overridden: true };
  }

  const intentType = pickFromVocabulary(parsed.intent_type, INTENT_TYPES);
  const intentConfidence = readConfidence(parsed.intent_confidence);

  if (!intentType || intentConfidence < deps.threshold) {
    return { intentType: "query", intentConfidence, intentDetails: AMBIGUOUS_INTENT_DETAILS, overridden: true };
  }

  return {
    intentType,
    intentConfidence,
    intentDetails: readDetails(parsed.intent_details),
    overridden: false,
  };
}
