// backend/src/dispatch/dispatcher.ts

import type { ContentAgent, ContentHandler } from "../agents/contentAgent";
import type { DocumentAnalysisResult } from "../agents/documentAnalysis";
import type { UnitsResult } from "../agents/explainableUnits";
import type { TutorResult } from "../agents/tutorAgent";
import type { DocumentSummary } from "../rag/answerSchemas";
import type { ContextSource } from "../rag/contextAssembler";
import { NO_DOCUMENTS_MESSAGE, processingErrorMessage, type KnowledgeResult, type KnowledgeRoute } from "../rag/knowledgeRoute";
import type {
  ActionRequest,
  ActionType,
  ConversationStore,
  CursorStore,
  DocumentRecord,
  DocumentStore,
  NoteRecord,
  NoteStore,
  QueryRequest,
  QueryRoute,
  RouterDecisionStore,
  SessionStore,
} from "../types";
import { logServerError, logWarn } from "../utils/logger";
import { readBookmarks, withBookmark, type Bookmark } from "./bookmarks";
import { resolveNote } from "./noteText";
import { pageNumbersOf, type PageRenderer, type RenderedPage } from "./pageRenderer";

export const NO_PAGES_MESSAGE = "No document loaded or pages available";

type ActionOutcome =
  | { status: "ok"; action: "open_doc"; documentId: string; title: string; pages: RenderedPage[]; cursor: number }
  | {
      status: "ok" | "empty";
      action: "next_section" | "prev_section";
      documentId: string;
      page: number;
      totalPages: number;
      rendered: RenderedPage | null;
    }
  | {
      status: "limit_reached" | "start_of_document";
      action: "next_section" | "prev_section";
      documentId: string;
      page: number;
      totalPages: number;
    }
  | { status: "ok"; action: "location"; documentId: string; title: string; page: number; totalPages: number }
  | { status: "ok"; action: "add_note"; note: NoteRecord }
  | { status: "ok" | "empty"; action: "open_note"; notes: NoteRecord[] }
  | { status: "ok"; action: "bookmark"; bookmark: Bookmark }
  | { status: "ok" | "empty"; action: "show_bookmarks"; bookmarks: Bookmark[] }
  | { status: "ok"; action: "open_chat" | "close_chat" | "close_doc"; uiEvent: ActionType }
  | {
      status: "error";
      action: ActionType | "unknown";
      code: "no_document" | "no_pages" | "missing_note_text" | "no_session" | "storage_error";
    }
  | { status: "unknown_action"; action: "unknown"; utterance: string };

export type ActionResult = ActionOutcome & { message: string };

export type QueryResult = {
  status: "ok" | "no_document" | "error";
  route: QueryRoute;
  /** which content-agent sub-handler answered; null for the other routes */
  handler: ContentHandler | null;
  answer: string;
  knowledgeStatus: KnowledgeResult<unknown>["status"] | null;
  sources: ContextSource[];
  delegated: boolean;
  summary: DocumentSummary | null;
  tutoring: TutorResult | null;
  analysis: DocumentAnalysisResult | null;
  units: UnitsResult | null;
};

export type DispatcherDeps = {
  documents: DocumentStore;
  sessions: SessionStore;
  notes: NoteStore;
  conversations: ConversationStore;
  decisions: RouterDecisionStore;
  cursors: CursorStore;
  renderer: PageRenderer;
  qa: KnowledgeRoute<string>;
  summarization: KnowledgeRoute<DocumentSummary>;
  contentAgent: ContentAgent;
};

type Ctx = { requestId?: string };

export function createDispatcher(deps: DispatcherDeps) {
  async function recordTurn(sessionId: string | null, query: string, answer: string, ctx: Ctx) {
    try {
      await deps.conversations.append({ sessionId, query, answer });
    } catch (err) {
      logWarn("conversation_turn_write_failed", err, { requestId: ctx.requestId });
    }
  }

  async function resolveDocument(scope: { sessionId: string | null; documentId: string | null }) {
    if (scope.documentId) return deps.documents.get(scope.documentId);
    return deps.documents.latest(scope.sessionId);
  }

  /** Session-held cursor when there is a session; otherwise whatever page the client says it is on. */
  async function readCursor(req: ActionRequest, doc: DocumentRecord): Promise<number> {
    if (!req.sessionId) return req.currentPage ?? 0;
    return (await deps.cursors.get({ sessionId: req.sessionId, documentId: doc.id })) ?? 0;
  }

  async function commitCursor(req: ActionRequest, doc: DocumentRecord, page: number) {
    if (req.sessionId) await deps.cursors.set({ sessionId: req.sessionId, documentId: doc.id }, page);
  }

  function noDocument(action: ActionType): ActionResult {
    return { status: "error", action, code: "no_document", message: NO_PAGES_MESSAGE };
  }

  async function page(req: ActionRequest, doc: DocumentRecord, direction: 1 | -1): Promise<ActionResult> {
    const action = direction === 1 ? "next_section" : "prev_section";
    const pages = pageNumbersOf(doc);
    if (pages.length === 0) return { status: "error", action, code: "no_pages", message: NO_PAGES_MESSAGE };

    const lastPage = Math.max(...pages);
    const current = await readCursor(req, doc);
    const requested = current + direction;

    if (requested > lastPage) {
      return {
        status: "limit_reached",
        action,
        documentId: doc.id,
        page: current,
        totalPages: lastPage,
        message: "You have reached the end of the document.",
      };
    }
    if (requested < 1) {
      return {
        status: "start_of_document",
        action,
        documentId: doc.id,
        page: current,
        totalPages: lastPage,
        message: "You are already at the start of the document.",
      };
    }

    const text = doc.pages[String(requested)] ?? "";
    const [rendered] = text.trim() ? await deps.renderer.render(doc, [requested]) : [];
    await commitCursor(req, doc, requested);

    return {
      status: text.trim() ? "ok" : "empty",
      action,
      documentId: doc.id,
      page: requested,
      totalPages: lastPage,
      rendered: rendered ?? null,
      message: text.trim() ? `Page ${requested} of ${lastPage}.` : `Page ${requested} has no content.`,
    };
  }

  async function runAction(req: ActionRequest): Promise<ActionResult> {
    switch (req.type) {
      case "open_doc": {
        const doc = await resolveDocument({ sessionId: req.sessionId, documentId: req.documentId ?? req.arguments.docId });
        if (!doc) return noDocument("open_doc");
        const pages = pageNumbersOf(doc);
        if (pages.length === 0) return { status: "error", action: "open_doc", code: "no_pages", message: NO_PAGES_MESSAGE };
        const rendered = await deps.renderer.render(doc, pages);
        await commitCursor(req, doc, 0);
        return {
          status: "ok",
          action: "open_doc",
          documentId: doc.id,
          title: doc.title,
          pages: rendered,
          cursor: 0,
          message: `Opened "${doc.title}" (${pages.length} pages).`,
        };
      }
      case "next_section":
      case "prev_section": {
        const doc = await resolveDocument(req);
        if (!doc) return noDocument(req.type);
        return page(req, doc, req.type === "next_section" ? 1 : -1);
      }
      case "location": {
        const doc = await resolveDocument(req);
        if (!doc) return noDocument("location");
        const pages = pageNumbersOf(doc);
        const current = await readCursor(req, doc);
        const totalPages = pages.length ? Math.max(...pages) : 0;
        return {
          status: "ok",
          action: "location",
          documentId: doc.id,
          title: doc.title,
          page: current,
          totalPages,
          message: current > 0 ? `You are on page ${current} of ${totalPages} in "${doc.title}".` : `You are at the start of "${doc.title}".`,
        };
      }
      case "close_doc":
        if (req.sessionId) await deps.cursors.clear(req.sessionId);
        return { status: "ok", action: "close_doc", uiEvent: "close_doc", message: "Document closed." };
      case "open_chat":
        return { status: "ok", action: "open_chat", uiEvent: "open_chat", message: "Chat opened." };
      case "close_chat":
        return { status: "ok", action: "close_chat", uiEvent: "close_chat", message: "Chat closed." };
      case "add_note": {
        if (!req.sessionId) {
          return { status: "error", action: "add_note", code: "no_session", message: "Notes need a session." };
        }
        const { noteText, page: notePage } = resolveNote(req.arguments, req.utterance);
        if (!noteText) {
          return { status: "error", action: "add_note", code: "missing_note_text", message: "Missing note text, cannot create note." };
        }
        const doc = await resolveDocument(req);
        const note = await deps.notes.create({
          sessionId: req.sessionId,
          documentId: doc?.id ?? null,
          content: noteText,
          page: notePage,
        });
        return {
          status: "ok",
          action: "add_note",
          note,
          message: notePage !== null ? `Note saved on page ${notePage}.` : "Note saved.",
        };
      }
      case "open_note": {
        if (!req.sessionId) {
          return { status: "error", action: "open_note", code: "no_session", message: "Notes need a session." };
        }
        const notes = await deps.notes.list(req.sessionId, req.arguments.pageNum);
        return {
          status: notes.length ? "ok" : "empty",
          action: "open_note",
          notes,
          message: notes.length ? `You have ${notes.length} note(s).` : "You have no notes yet.",
        };
      }
      case "bookmark": {
        if (!req.sessionId) {
          return { status: "error", action: "bookmark", code: "no_session", message: "Bookmarks need a session." };
        }
        const doc = await resolveDocument(req);
        if (!doc) return noDocument("bookmark");
        const current = await readCursor(req, doc);
        const bookmark: Bookmark = { documentId: doc.id, page: Math.max(1, current), createdAt: new Date().toISOString() };
        const session = await deps.sessions.get(req.sessionId);
        await deps.sessions.patchMetadata(req.sessionId, {
          bookmarks: withBookmark(readBookmarks(session?.metadata), bookmark),
        });
        return { status: "ok", action: "bookmark", bookmark, message: `Bookmarked page ${bookmark.page}.` };
      }
      case "show_bookmarks": {
        if (!req.sessionId) {
          return { status: "error", action: "show_bookmarks", code: "no_session", message: "Bookmarks need a session." };
        }
        const session = await deps.sessions.get(req.sessionId);
        const bookmarks = readBookmarks(session?.metadata);
        return {
          status: bookmarks.length ? "ok" : "empty",
          action: "show_bookmarks",
          bookmarks,
          message: bookmarks.length ? `You have ${bookmarks.length} bookmark(s).` : "You have no bookmarks yet.",
        };
      }
      case "unknown":
        return {
          status: "unknown_action",
          action: "unknown",
          utterance: req.utterance,
          message: "I couldn't tell which action you meant. Please rephrase the command.",
        };
    }
  }

  async function dispatchAction(req: ActionRequest, ctx: Ctx = {}): Promise<ActionResult> {
    let result: ActionResult;
    try {
      result = await runAction(req);
    } catch (err) {
      logServerError(`dispatch:${req.type}`, err, ctx.requestId);
      result = {
        status: "error",
        action: req.type,
        code: "storage_error",
        message: processingErrorMessage(err),
      };
    }
    await recordTurn(req.sessionId, req.utterance, result.message, ctx);
    return result;
  }

  async function runQuery(req: QueryRequest, ctx: Ctx): Promise<QueryResult> {
    const base = {
      route: req.route,
      handler: null,
      sources: [],
      delegated: false,
      summary: null,
      tutoring: null,
      analysis: null,
      units: null,
    };

    if (req.route === "content_agent") {
      const out = await deps.contentAgent({
        query: req.query,
        sessionId: req.sessionId,
        learnerId: req.learnerId,
        documentId: req.documentId,
        state: req.state,
        requestId: ctx.requestId,
      });
      return {
        ...base,
        status: out.status === "no_documents" ? "no_document" : out.status,
        handler: out.handler,
        answer: out.answer,
        knowledgeStatus: out.knowledge?.status ?? null,
        sources: out.knowledge?.sources ?? [],
        delegated: out.delegated,
        tutoring: out.tutoring,
        analysis: out.analysis,
        units: out.units,
      };
    }

    const doc = await resolveDocument(req);
    if (!doc) {
      return { ...base, status: "no_document", answer: NO_DOCUMENTS_MESSAGE, knowledgeStatus: null };
    }

    const input = { query: req.query, sessionId: req.sessionId, filter: { documentId: doc.id }, requestId: ctx.requestId };
    if (req.route === "qa") {
      const out = await deps.qa(input);
      return { ...base, status: out.status === "error" ? "error" : "ok", answer: out.answer, knowledgeStatus: out.status, sources: out.sources };
    }

    const out = await deps.summarization(input);
    return {
      ...base,
      status: out.status === "error" ? "error" : "ok",
      answer: out.answer,
      knowledgeStatus: out.status,
      sources: out.sources,
      summary: out.payload,
    };
  }

  async function dispatchQuery(req: QueryRequest, ctx: Ctx = {}): Promise<QueryResult> {
    try {
      await deps.decisions.append(req.query, req.route);
    } catch (err) {
      logWarn("router_decision_write_failed", err, { requestId: ctx.requestId });
    }

    let result: QueryResult;
    try {
      result = await runQuery(req, ctx);
    } catch (err) {
      logServerError(`dispatch:${req.route}`, err, ctx.requestId);
      result = {
        status: "error",
        route: req.route,
        handler: null,
        answer: processingErrorMessage(err),
        knowledgeStatus: null,
        sources: [],
        delegated: false,
        summary: null,
        tutoring: null,
        analysis: null,
        units: null,
      };
    }
    await recordTurn(req.sessionId, req.query, result.answer, ctx);
    return result;
  }

  return { dispatchAction, dispatchQuery };
}

export type Dispatcher = ReturnType<typeof createDispatcher>;
