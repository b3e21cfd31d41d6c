import { z } from "zod";

const envSchema = z.object({
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required."),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_ANALYSIS_MODEL: z.string().default("gpt-3.5-turbo"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  STORE_BACKEND: z.enum(["memory", "postgres"]).default("memory"),
  DATABASE_URL: z.string().optional(),
  LOCAL_USERS: z.string().default(""),
  NOTION_API_KEY: z.string().optional(),
  NOTION_DATABASE_ID: z.string().optional(),
  CHUNK_SIZE: z.coerce.number().int().min(100).default(5000),
  INGEST_CONCURRENCY: z.coerce.number().int().positive().default(4),
  EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HISTORY_LIMIT: z.coerce.number().int().positive().default(5),
  APP_TRANSPORT: z.enum(["stdio", "http"]).default("http"),
  APP_HOST: z.string().default("0.0.0.0"),
  APP_PORT: z.coerce.number().int().positive().default(8000),
});

export interface AppConfig {
  openaiApiKey: string;
  openaiBaseUrl: string;
  chatModel: string;
  analysisModel: string;
  embeddingModel: string;
  vectorDimension: number;
  storeBackend: "memory" | "postgres";
  databaseUrl: string | null;
  /** Identities seeded into the in-memory conversation store. */
  localUsers: Array<[number, string]>;
  notionApiKey: string | null;
  notionDatabaseId: string | null;
  chunkSize: number;
  ingestConcurrency: number;
  externalCallTimeoutMs: number;
  historyLimit: number;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.STORE_BACKEND === "postgres" && !parsed.DATABASE_URL) {
    throw new Error("STORE_BACKEND=postgres requires DATABASE_URL.");
  }

  return {
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    chatModel: parsed.OPENAI_CHAT_MODEL,
    analysisModel: parsed.OPENAI_ANALYSIS_MODEL,
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    vectorDimension: parsed.VECTOR_DIMENSION,
    storeBackend: parsed.STORE_BACKEND,
    databaseUrl: parsed.DATABASE_URL || null,
    localUsers: parseLocalUsers(parsed.LOCAL_USERS),
    notionApiKey: parsed.NOTION_API_KEY || null,
    notionDatabaseId: parsed.NOTION_DATABASE_ID || null,
    chunkSize: parsed.CHUNK_SIZE,
    ingestConcurrency: parsed.INGEST_CONCURRENCY,
    externalCallTimeoutMs: parsed.EXTERNAL_CALL_TIMEOUT_MS,
    historyLimit: parsed.HISTORY_LIMIT,
    transport: parsed.APP_TRANSPORT,
    host: parsed.APP_HOST,
    port: parsed.APP_PORT,
  };
}

/** `"123:user-a,456:user-b"` → `[[123, "user-a"], [456, "user-b"]]`. */
export function parseLocalUsers(raw: string): Array<[number, string]> {
  const users: Array<[number, string]> = [];
  for (const entry of raw.split(",").map((item) => item.trim()).filter(Boolean)) {
    const separator = entry.indexOf(":");
    const externalId = Number(entry.slice(0, separator));
    const userId = entry.slice(separator + 1).trim();
    if (separator <= 0 || !Number.isInteger(externalId) || !userId) {
      throw new Error(`Invalid LOCAL_USERS entry "${entry}". Expected <telegram_id>:<user_id>.`);
    }
    users.push([externalId, userId]);
  }
  return users;
}

export function requireNotionConfig(config: AppConfig): {
  apiKey: string;
  databaseId: string;
} {
  if (!config.notionApiKey || !config.notionDatabaseId) {
    throw new Error(
      "NOTION_API_KEY and NOTION_DATABASE_ID are required for document ingestion.",
    );
  }
  return { apiKey: config.notionApiKey, databaseId: config.notionDatabaseId };
}
