import { randomUUID } from "node:crypto";
import type {
  ConversationRepository,
  NewTurnInput,
  TurnAnalysisUpdate,
} from "../../domain/conversationRepository.js";
import type { ConversationTurn } from "../../domain/types.js";
import { KeyedMutex } from "../../utils/keyedMutex.js";

export interface InMemoryConversationRepositoryOptions {
  /** External id → internal user id. */
  users?: Iterable<[number, string]>;
  now?: () => Date;
}

export class InMemoryConversationRepository implements ConversationRepository {
  private readonly users: Map<number, string>;

  private readonly turns = new Map<string, ConversationTurn>();

  private readonly sessionLocks = new KeyedMutex();

  private readonly now: () => Date;

  constructor(options: InMemoryConversationRepositoryOptions = {}) {
    this.users = new Map(options.users ?? []);
    this.now = options.now ?? (() => new Date());
  }

  async findUserIdByExternalId(externalId: number): Promise<string | null> {
    return this.users.get(externalId) ?? null;
  }

  async appendTurn(input: NewTurnInput): Promise<ConversationTurn> {
    return this.sessionLocks.runExclusive(`${input.userId}:${input.sessionId}`, async () => {
      const lastSequence = this.sessionTurns(input.userId, input.sessionId).reduce(
        (max, turn) => Math.max(max, turn.messageSequence),
        0,
      );

      const turn: ConversationTurn = {
        id: randomUUID(),
        userId: input.userId,
        sessionId: input.sessionId,
        question: input.question,
        answer: input.answer,
        messageSequence: lastSequence + 1,
        totalTokens: input.totalTokens,
        executionTime: input.executionTime,
        metadata: { ...(input.metadata ?? {}) },
        sentiment: null,
        summary: null,
        topics: null,
        createdAt: this.now().toISOString(),
      };
      this.turns.set(turn.id, turn);
      return cloneTurn(turn);
    });
  }

  async listRecent(userId: string, sessionId: number, limit: number): Promise<ConversationTurn[]> {
    return this.sessionTurns(userId, sessionId)
      .sort((a, b) => b.messageSequence - a.messageSequence)
      .slice(0, limit)
      .map(cloneTurn);
  }

  async findById(id: string): Promise<ConversationTurn | null> {
    const turn = this.turns.get(id);
    return turn ? cloneTurn(turn) : null;
  }

  async updateAnalysis(id: string, update: TurnAnalysisUpdate): Promise<ConversationTurn | null> {
    const turn = this.turns.get(id);
    if (!turn) {
      return null;
    }

    const updated: ConversationTurn = {
      ...turn,
      sentiment: update.sentiment,
      summary: update.summary,
      topics: [...update.topics],
      metadata: { ...update.metadata },
    };
    this.turns.set(id, updated);
    return cloneTurn(updated);
  }

  private sessionTurns(userId: string, sessionId: number): ConversationTurn[] {
    return [...this.turns.values()].filter(
      (turn) => turn.userId === userId && turn.sessionId === sessionId,
    );
  }
}

function cloneTurn(turn: ConversationTurn): ConversationTurn {
  return {
    ...turn,
    metadata: { ...turn.metadata },
    topics: turn.topics ? [...turn.topics] : null,
  };
}
