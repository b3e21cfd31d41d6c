import type { AgentRouter } from "./agents/agentRouter.js";
import { InMemoryAgentStateStore } from "./agents/agentStateStore.js";
import { createAgentRouter } from "./agents/index.js";
import type { AppConfig } from "./config/env.js";
import type { ChunkStore } from "./domain/chunkStore.js";
import type { ConversationRepository } from "./domain/conversationRepository.js";
import type { DocumentSource } from "./domain/document.js";
import { OpenAiClient } from "./infra/ai/openAiClient.js";
import type { LlmClient } from "./infra/ai/types.js";
import { NotionDocumentSource } from "./infra/notion/notionDocumentSource.js";
import { createStores } from "./infra/store/createStores.js";
import { Categorizer } from "./services/categorizer.js";
import { ChunkDescriber } from "./services/chunkDescriber.js";
import { ConversationService } from "./services/conversationService.js";
import { DocumentIngestor } from "./services/documentIngestor.js";
import { Embedder } from "./services/embedder.js";
import { Orchestrator } from "./services/orchestrator.js";
import { Retriever } from "./services/retriever.js";

export interface Infrastructure {
  client: LlmClient;
  chunkStore: ChunkStore;
  conversationRepository: ConversationRepository;
  /** Null when the Notion credentials are not configured. */
  documentSource: DocumentSource | null;
}

export interface AppServices {
  retriever: Retriever;
  conversations: ConversationService;
  router: AgentRouter;
  orchestrator: Orchestrator;
  ingestor: DocumentIngestor;
  documentSource: DocumentSource | null;
}

export function assembleServices(config: AppConfig, infra: Infrastructure): AppServices {
  const embedder = new Embedder(infra.client, config.vectorDimension);
  const categorizer = new Categorizer(infra.client, config.chatModel);
  const retriever = new Retriever(infra.chunkStore, embedder, categorizer);
  const conversations = new ConversationService({
    repository: infra.conversationRepository,
    client: infra.client,
    analysisModel: config.analysisModel,
  });
  const router = createAgentRouter({
    client: infra.client,
    retriever,
    states: new InMemoryAgentStateStore(),
    chatModel: config.chatModel,
    triageModel: config.chatModel,
  });
  const orchestrator = new Orchestrator({
    conversations,
    router,
    historyLimit: config.historyLimit,
  });
  const ingestor = new DocumentIngestor({
    store: infra.chunkStore,
    describer: new ChunkDescriber(infra.client, config.chatModel),
    embedder,
    categorizer,
    chunkSize: config.chunkSize,
    concurrency: config.ingestConcurrency,
  });

  return {
    retriever,
    conversations,
    router,
    orchestrator,
    ingestor,
    documentSource: infra.documentSource,
  };
}

export async function createServices(
  config: AppConfig,
): Promise<{ services: AppServices; close: () => Promise<void> }> {
  const { chunkStore, conversations, close } = await createStores(config);
  const client = new OpenAiClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    chatModel: config.chatModel,
    embeddingModel: config.embeddingModel,
    vectorDimension: config.vectorDimension,
    timeoutMs: config.externalCallTimeoutMs,
  });
  const documentSource =
    config.notionApiKey && config.notionDatabaseId
      ? new NotionDocumentSource({
          apiKey: config.notionApiKey,
          databaseId: config.notionDatabaseId,
          timeoutMs: config.externalCallTimeoutMs,
        })
      : null;

  const services = assembleServices(config, {
    client,
    chunkStore,
    conversationRepository: conversations,
    documentSource,
  });

  return {
    services,
    close: async () => {
      await services.orchestrator.drain();
      await close();
    },
  };
}
