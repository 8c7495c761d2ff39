// backend/src/services/container.ts
// Long-lived collaborators, built once per process. Everything below is
// stateless apart from SessionMemory, which is keyed by session id.

import { createContentAgent, type ContentAgent } from "../agents/contentAgent";
import { createDocumentAnalysis } from "../agents/documentAnalysis";
import { createExplainableUnits } from "../agents/explainableUnits";
import { createTutorAgent, type TutorAgent } from "../agents/tutorAgent";
import type { CompletionClient, EmbeddingClient } from "../ai/clients";
import { createOpenAICompletionClient, createOpenAIEmbeddingClient } from "../ai/openaiClient";
import {
  CONTENT_AGENT_INSTRUCTIONS,
  LEARNING_UNIT_INSTRUCTIONS,
  QA_INSTRUCTIONS,
  SUMMARY_INSTRUCTIONS,
} from "../ai/prompts/answerPrompts";
import { isRerankEnabled } from "../config/featureFlags";
import { getPipelineConfig, type PipelineConfig } from "../config/pipelineConfig";
import { createDispatcher, type Dispatcher } from "../dispatch/dispatcher";
import { textPageRenderer, type PageRenderer } from "../dispatch/pageRenderer";
import {
  createJsonAnswerGenerator,
  createSchemaAnswerGenerator,
  createTextAnswerGenerator,
  type JsonAnswer,
} from "../rag/answerGenerator";
import { learningUnitOptions, summaryOptions, type DocumentSummary, type LearningUnit } from "../rag/answerSchemas";
import { createKnowledgeRoute, type KnowledgeRoute, type KnowledgeRouteSettings } from "../rag/knowledgeRoute";
import { createEmbeddingReranker } from "../rag/reranker";
import { createRetriever } from "../rag/retriever";
import { SessionMemory } from "../rag/sessionMemory";
import { createRouterChain, type RouterChain } from "../routing/routerChain";
import { mongoConversationStore, mongoNoteStore, mongoRouterDecisionStore } from "../storage/conversationStore";
import { mongoChunkStore, mongoDocumentStore } from "../storage/documentStore";
import { mongoLearnerProfileStore } from "../storage/learnerProfileStore";
import { mongoLearningUnitStore } from "../storage/learningUnitStore";
import { mongoCursorStore, mongoSessionStore } from "../storage/sessionStore";
import { mongoInteractionStore, mongoTutoringSessionStore } from "../storage/tutoringStore";
import { createSessionManager, type SessionManager } from "../tutoring/sessionManager";
import type {
  ChunkStore,
  ConversationStore,
  CursorStore,
  DocumentStore,
  InteractionStore,
  LearnerProfileStore,
  LearningUnitStore,
  NoteStore,
  RouterDecisionStore,
  SessionStore,
  TutoringSessionStore,
} from "../types";
import { createIngestion, type Ingestion } from "./ingestion";

export type Stores = {
  sessions: SessionStore;
  documents: DocumentStore;
  chunks: ChunkStore;
  decisions: RouterDecisionStore;
  conversations: ConversationStore;
  notes: NoteStore;
  cursors: CursorStore;
  profiles: LearnerProfileStore;
  tutoringSessions: TutoringSessionStore;
  interactions: InteractionStore;
  learningUnits: LearningUnitStore;
};

export type ServiceDeps = {
  config: PipelineConfig;
  completion: CompletionClient;
  embeddings: EmbeddingClient;
  stores: Stores;
  renderer?: PageRenderer;
  clock?: () => number;
};

export type Services = {
  config: PipelineConfig;
  stores: Stores;
  memory: SessionMemory;
  qa: KnowledgeRoute<string>;
  summarization: KnowledgeRoute<DocumentSummary>;
  learningUnit: KnowledgeRoute<LearningUnit>;
  contentKnowledge: KnowledgeRoute<JsonAnswer>;
  tutoringSessions: SessionManager;
  tutor: TutorAgent;
  contentAgent: ContentAgent;
  dispatcher: Dispatcher;
  router: RouterChain;
  ingest: Ingestion;
};

export function buildServices(deps: ServiceDeps): Services {
  const { config, completion, embeddings, stores } = deps;
  const memory = new SessionMemory(config.memory.windowSize);
  const retriever = createRetriever({ embeddings, chunks: stores.chunks, documents: stores.documents });

  const settings = (name: string, threshold: number): KnowledgeRouteSettings => ({
    name,
    threshold,
    topK: config.retrieval.topK,
    maxContextDocs: config.retrieval.maxContextDocs,
    maxContextChars: config.retrieval.maxContextChars,
    historyTurns: config.memory.historyTurns,
  });

  const qa = createKnowledgeRoute(settings("qa", config.relevance.qa), {
    retriever,
    memory,
    generator: createTextAnswerGenerator({ completion, instructions: QA_INSTRUCTIONS }),
  });

  const summarization = createKnowledgeRoute(settings("summarization", config.relevance.summarization), {
    retriever,
    memory,
    generator: createSchemaAnswerGenerator({ completion, instructions: SUMMARY_INSTRUCTIONS }, summaryOptions),
  });

  const learningUnit = createKnowledgeRoute(settings("learning_unit", config.relevance.contentAgent), {
    retriever,
    memory,
    generator: createSchemaAnswerGenerator({ completion, instructions: LEARNING_UNIT_INSTRUCTIONS }, learningUnitOptions),
  });

  const reranker = createEmbeddingReranker(embeddings);
  const contentKnowledge = createKnowledgeRoute(settings("content_agent", config.relevance.contentAgent), {
    retriever,
    memory,
    generator: createJsonAnswerGenerator({ completion, instructions: CONTENT_AGENT_INSTRUCTIONS }),
    reranker,
    rerankEnabled: isRerankEnabled,
  });

  const tutoringSessions = createSessionManager({ profiles: stores.profiles, sessions: stores.tutoringSessions });
  const tutor = createTutorAgent({
    completion,
    sessions: tutoringSessions,
    logger: { interactions: stores.interactions, sessions: stores.tutoringSessions },
    clock: deps.clock,
  });
  const contentAgent = createContentAgent({
    knowledge: contentKnowledge,
    tutor,
    decisions: stores.decisions,
    analyze: createDocumentAnalysis(
      { threshold: config.relevance.documentAnalysis, topK: config.retrieval.topK },
      { retriever, reranker }
    ),
    buildUnits: createExplainableUnits({
      completion,
      documents: stores.documents,
      units: stores.learningUnits,
      maxContentChars: config.retrieval.maxContextChars,
    }),
  });

  const dispatcher = createDispatcher({
    documents: stores.documents,
    sessions: stores.sessions,
    notes: stores.notes,
    conversations: stores.conversations,
    decisions: stores.decisions,
    cursors: stores.cursors,
    renderer: deps.renderer ?? textPageRenderer,
    qa,
    summarization,
    contentAgent,
  });

  const router = createRouterChain({ completion, threshold: config.routerConfidenceThreshold, dispatcher });
  const ingest = createIngestion({ documents: stores.documents, chunks: stores.chunks, embeddings, chunking: config.chunking });

  return {
    config,
    stores,
    memory,
    qa,
    summarization,
    learningUnit,
    contentKnowledge,
    tutoringSessions,
    tutor,
    contentAgent,
    dispatcher,
    router,
    ingest,
  };
}

export const mongoStores: Stores = {
  sessions: mongoSessionStore,
  documents: mongoDocumentStore,
  chunks: mongoChunkStore,
  decisions: mongoRouterDecisionStore,
  conversations: mongoConversationStore,
  notes: mongoNoteStore,
  cursors: mongoCursorStore,
  profiles: mongoLearnerProfileStore,
  tutoringSessions: mongoTutoringSessionStore,
  interactions: mongoInteractionStore,
  learningUnits: mongoLearningUnitStore,
};

let services: Services | null = null;

export function getServices(): Services {
  if (!services) {
    const config = getPipelineConfig();
    services = buildServices({
      config,
      completion: createOpenAICompletionClient(config),
      embeddings: createOpenAIEmbeddingClient(config),
      stores: mongoStores,
    });
  }
  return services;
}
