// backend/src/types/routing.ts

export const INTENT_TYPES = ["action", "query"] as const;
export type IntentType = (typeof INTENT_TYPES)[number];

export const ACTION_TYPES = [
  "open_doc",
  "add_note",
  "open_chat",
  "close_chat",
  "bookmark",
  "show_bookmarks",
  "next_section",
  "prev_section",
  "location",
  "open_note",
  "close_doc",
] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

export const QUERY_ROUTES = ["qa", "summarization", "content_agent"] as const;
export type QueryRoute = (typeof QUERY_ROUTES)[number];

export type IntentDecision = {
  intentType: IntentType;
  intentConfidence: number;
  intentDetails: string;
  /** true when the gate replaced the model's answer with the default */
  overridden: boolean;
};

export type SubRouteDecision<T extends string> = {
  type: T | "unknown";
  confidence: number;
  details: string;
  overridden: boolean;
  raw: Record<string, unknown>;
};

export type ActionArguments = {
  docId: string | null;
  pageNum: number | null;
  noteText: string | null;
};

export type ActionDecision = SubRouteDecision<ActionType> & { arguments: ActionArguments };
export type QueryDecision = SubRouteDecision<QueryRoute>;

export type RequestScope = {
  sessionId: string | null;
  documentId: string | null;
};

export type ActionRequest = RequestScope & {
  type: ActionType | "unknown";
  utterance: string;
  arguments: ActionArguments;
  /** explicit page the client is on, used when there is no session to hold a cursor */
  currentPage: number | null;
};

export type QueryRequest = RequestScope & {
  route: QueryRoute;
  query: string;
  learnerId: string | null;
  state: Record<string, unknown>;
};
