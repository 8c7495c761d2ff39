// backend/src/routing/routerChain.ts

import type { CompletionClient } from "../ai/clients";
import type { ActionResult, Dispatcher, QueryResult } from "../dispatch/dispatcher";
import type { ActionDecision, IntentDecision, QueryDecision, QueryRoute } from "../types";
import { logInfo } from "../utils/logger";
import { createActionRouter } from "./actionRouter";
import { classifyIntent } from "./intentClassifier";
import { createQueryRouter, resolveQueryRoute } from "./queryRouter";

export type RouterInput = {
  utterance: string;
  sessionId: string | null;
  documentId: string | null;
  learnerId: string | null;
  currentPage: number | null;
  state: Record<string, unknown>;
  requestId?: string;
};

export type RouterOutcome =
  | { kind: "action"; intent: IntentDecision; decision: ActionDecision; result: ActionResult }
  | { kind: "query"; intent: IntentDecision; decision: QueryDecision; route: QueryRoute; result: QueryResult };

export type RouterChainDeps = {
  completion: CompletionClient;
  threshold: number;
  dispatcher: Dispatcher;
};

/** classify, sub-route, dispatch */
export function createRouterChain(deps: RouterChainDeps) {
  const gate = { completion: deps.completion, threshold: deps.threshold };
  const routeAction = createActionRouter(gate);
  const routeQuery = createQueryRouter(gate);

  async function runAction(input: RouterInput) {
    const decision = await routeAction(input.utterance);
    const result = await deps.dispatcher.dispatchAction(
      {
        type: decision.type,
        utterance: input.utterance,
        arguments: decision.arguments,
        currentPage: input.currentPage,
        sessionId: input.sessionId,
        documentId: input.documentId,
      },
      { requestId: input.requestId }
    );
    return { decision, result };
  }

  async function runQuery(input: RouterInput) {
    const decision = await routeQuery(input.utterance);
    const route = resolveQueryRoute(decision);
    const result = await deps.dispatcher.dispatchQuery(
      {
        route,
        query: input.utterance,
        learnerId: input.learnerId,
        state: input.state,
        sessionId: input.sessionId,
        documentId: input.documentId,
      },
      { requestId: input.requestId }
    );
    return { decision, route, result };
  }

  async function route(input: RouterInput): Promise<RouterOutcome> {
    const intent = await classifyIntent(input.utterance, gate);

    if (intent.intentType === "action") {
      const out = await runAction(input);
      logInfo("router_chain", {
        requestId: input.requestId,
        intent: intent.intentType,
        target: out.decision.type,
        status: out.result.status,
      });
      return { kind: "action", intent, ...out };
    }

    const out = await runQuery(input);
    logInfo("router_chain", {
      requestId: input.requestId,
      intent: intent.intentType,
      target: out.route,
      status: out.result.status,
    });
    return { kind: "query", intent, ...out };
  }

  return { route, routeAction: runAction, routeQuery: runQuery };
}

export type RouterChain = ReturnType<typeof createRouterChain>;
