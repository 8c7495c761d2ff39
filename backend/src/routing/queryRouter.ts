// backend/src/routing/queryRouter.ts

import { QUERY_ROUTER_PROMPT } from "../ai/prompts/routingPrompts";
import { QUERY_ROUTES, type QueryDecision, type QueryRoute } from "../types";
import { createSubRouter, type SubRouterDeps } from "./subRouter";

export const QUERY_CLARIFICATION = "Query type ambiguous. Routed to general chat.";

export function createQueryRouter(deps: SubRouterDeps): (utterance: string) => Promise<QueryDecision> {
  return createSubRouter<QueryRoute>(
    {
      name: "query_router",
      prompt: QUERY_ROUTER_PROMPT,
      vocabulary: QUERY_ROUTES,
      aliases: { agents: "content_agent", content_processor_agent: "content_agent" },
      fields: { type: "route", confidence: "route_confidence", details: "route_details" },
      clarification: QUERY_CLARIFICATION,
    },
    deps
  );
}

/** Unknown query routes fall through to the general content agent, which can ask for clarification. */
export function resolveQueryRoute(decision: QueryDecision): QueryRoute {
  return decision.type === "unknown" ? "content_agent" : decision.type;
}
