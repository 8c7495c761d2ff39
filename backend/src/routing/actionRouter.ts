// backend/src/routing/actionRouter.ts

import { ACTION_ROUTER_PROMPT } from "../ai/prompts/routingPrompts";
import { ACTION_TYPES, type ActionArguments, type ActionDecision, type ActionType } from "../types";
import { parsePositiveInt } from "../utils/text";
import { createSubRouter, type SubRouterDeps } from "./subRouter";

export const ACTION_CLARIFICATION = "Action type ambiguous or unavailable. Please clarify.";

function readString(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const t = value.trim();
  return t ? t : null;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/** Arguments may come nested under "arguments" or flat on the object; nested wins. */
export function readActionArguments(raw: Record<string, unknown>): ActionArguments {
  const nested = asRecord(raw.arguments);
  return {
    docId: readString(nested.doc_id) ?? readString(raw.doc_id),
    pageNum: parsePositiveInt(nested.page_num) ?? parsePositiveInt(raw.page_num),
    noteText: readString(nested.note_text) ?? readString(raw.note_text),
  };
}

export function createActionRouter(deps: SubRouterDeps) {
  const route = createSubRouter<ActionType>(
    {
      name: "action_router",
      prompt: ACTION_ROUTER_PROMPT,
      vocabulary: ACTION_TYPES,
      fields: { type: "action_type", confidence: "action_confidence", details: "action_details" },
      clarification: ACTION_CLARIFICATION,
    },
    deps
  );

  return async function routeAction(utterance: string): Promise<ActionDecision> {
    const decision = await route(utterance);
    return { ...decision, arguments: readActionArguments(decision.raw) };
  };
}
