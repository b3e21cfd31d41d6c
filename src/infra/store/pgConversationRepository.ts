import type { Pool } from "pg";
import type {
  ConversationRepository,
  NewTurnInput,
  TurnAnalysisUpdate,
} from "../../domain/conversationRepository.js";
import type { ConversationTurn, JsonMap } from "../../domain/types.js";

interface PgTurnRow {
  id: string;
  user_id: string;
  session_id: string | number;
  question: string;
  answer: string;
  message_sequence: number;
  total_tokens: number;
  execution_time: string | number;
  metadata: JsonMap | null;
  sentiment: string | null;
  summary: string | null;
  topics: string[] | null;
  created_at: Date;
}

const TURN_COLUMNS = `id, user_id, session_id, question, answer, message_sequence, total_tokens,
  execution_time, metadata, sentiment, summary, topics, created_at`;

export class PgConversationRepository implements ConversationRepository {
  private initialized = false;

  constructor(private readonly pool: Pool) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS pgcrypto`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS telegram_users (
        telegram_id BIGINT PRIMARY KEY,
        auth_user_id TEXT NOT NULL
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS user_conversations (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        user_id TEXT NOT NULL,
        session_id BIGINT NOT NULL,
        question TEXT NOT NULL,
        answer TEXT NOT NULL,
        message_sequence INTEGER NOT NULL,
        total_tokens INTEGER NOT NULL DEFAULT 0,
        execution_time DOUBLE PRECISION NOT NULL DEFAULT 0,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        sentiment TEXT,
        summary TEXT,
        topics TEXT[],
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        UNIQUE (user_id, session_id, message_sequence)
      )
    `);
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_user_conversations_session
      ON user_conversations (user_id, session_id, message_sequence DESC)
    `);

    this.initialized = true;
  }

  async findUserIdByExternalId(externalId: number): Promise<string | null> {
    await this.initialize();
    const result = await this.pool.query<{ auth_user_id: string }>(
      `SELECT auth_user_id FROM telegram_users WHERE telegram_id = $1`,
      [externalId],
    );
    return result.rows[0]?.auth_user_id ?? null;
  }

  async appendTurn(input: NewTurnInput): Promise<ConversationTurn> {
    await this.initialize();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      // Concurrent writers for the same session queue here until COMMIT.
      await client.query(`SELECT pg_advisory_xact_lock(hashtext($1))`, [
        `${input.userId}:${input.sessionId}`,
      ]);

      const result = await client.query<PgTurnRow>(
        `
          INSERT INTO user_conversations (
            user_id, session_id, question, answer, message_sequence,
            total_tokens, execution_time, metadata
          )
          SELECT $1, $2, $3, $4, COALESCE(MAX(message_sequence), 0) + 1, $5, $6, $7::jsonb
          FROM user_conversations
          WHERE user_id = $1 AND session_id = $2
          RETURNING ${TURN_COLUMNS}
        `,
        [
          input.userId,
          input.sessionId,
          input.question,
          input.answer,
          input.totalTokens,
          input.executionTime,
          JSON.stringify(input.metadata ?? {}),
        ],
      );

      await client.query("COMMIT");
      return toTurn(result.rows[0]);
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async listRecent(userId: string, sessionId: number, limit: number): Promise<ConversationTurn[]> {
    await this.initialize();
    const result = await this.pool.query<PgTurnRow>(
      `
        SELECT ${TURN_COLUMNS}
        FROM user_conversations
        WHERE user_id = $1 AND session_id = $2
        ORDER BY message_sequence DESC
        LIMIT $3
      `,
      [userId, sessionId, limit],
    );
    return result.rows.map(toTurn);
  }

  async findById(id: string): Promise<ConversationTurn | null> {
    await this.initialize();
    const result = await this.pool.query<PgTurnRow>(
      `SELECT ${TURN_COLUMNS} FROM user_conversations WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? toTurn(result.rows[0]) : null;
  }

  async updateAnalysis(id: string, update: TurnAnalysisUpdate): Promise<ConversationTurn | null> {
    await this.initialize();
    const result = await this.pool.query<PgTurnRow>(
      `
        UPDATE user_conversations
        SET sentiment = $2, summary = $3, topics = $4::text[], metadata = $5::jsonb
        WHERE id = $1
        RETURNING ${TURN_COLUMNS}
      `,
      [id, update.sentiment, update.summary, update.topics, JSON.stringify(update.metadata)],
    );
    return result.rows[0] ? toTurn(result.rows[0]) : null;
  }
}

function toTurn(row: PgTurnRow): ConversationTurn {
  return {
    id: row.id,
    userId: row.user_id,
    sessionId: Number(row.session_id),
    question: row.question,
    answer: row.answer,
    messageSequence: row.message_sequence,
    totalTokens: row.total_tokens,
    executionTime: Number(row.execution_time),
    metadata: row.metadata ?? {},
    sentiment: row.sentiment,
    summary: row.summary,
    topics: row.topics,
    createdAt: row.created_at.toISOString(),
  };
}
