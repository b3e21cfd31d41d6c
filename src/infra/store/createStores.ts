import type { AppConfig } from "../../config/env.js";
import type { ChunkStore } from "../../domain/chunkStore.js";
import type { ConversationRepository } from "../../domain/conversationRepository.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryChunkStore } from "./inMemoryChunkStore.js";
import { InMemoryConversationRepository } from "./inMemoryConversationRepository.js";
import { PgConversationRepository } from "./pgConversationRepository.js";
import { PgVectorChunkStore } from "./pgVectorChunkStore.js";

export interface StoresBootstrapResult {
  chunkStore: ChunkStore;
  conversations: ConversationRepository;
  close: () => Promise<void>;
}

export async function createStores(config: AppConfig): Promise<StoresBootstrapResult> {
  if (config.storeBackend === "memory") {
    return {
      chunkStore: new InMemoryChunkStore(),
      conversations: new InMemoryConversationRepository({ users: config.localUsers }),
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when STORE_BACKEND=postgres.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const chunkStore = new PgVectorChunkStore(pool, { vectorDimension: config.vectorDimension });
  const conversations = new PgConversationRepository(pool);
  try {
    await chunkStore.initialize();
    await conversations.initialize();
  } catch (error) {
    await pool.end();
    throw error;
  }

  return {
    chunkStore,
    conversations,
    close: async () => {
      await pool.end();
    },
  };
}
