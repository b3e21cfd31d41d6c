import { describe, expect, it } from "vitest";
import { InMemoryAgentStateStore } from "../src/agents/agentStateStore.js";
import { createAgentRouter } from "../src/agents/index.js";
import { SPECIALIST_PROFILES } from "../src/agents/profiles.js";
import type { NewTurnInput } from "../src/domain/conversationRepository.js";
import { NotFoundError } from "../src/domain/errors.js";
import type { ConversationTurn } from "../src/domain/types.js";
import { InMemoryChunkStore } from "../src/infra/store/inMemoryChunkStore.js";
import {
  InMemoryConversationRepository,
  type InMemoryConversationRepositoryOptions,
} from "../src/infra/store/inMemoryConversationRepository.js";
import { Categorizer } from "../src/services/categorizer.js";
import { ConversationService } from "../src/services/conversationService.js";
import { Embedder } from "../src/services/embedder.js";
import { APOLOGY_MESSAGE, Orchestrator } from "../src/services/orchestrator.js";
import { Retriever } from "../src/services/retriever.js";
import { FakeLlmClient, systemPrompt } from "./support/fakes.js";

class FailingOnceRepository extends InMemoryConversationRepository {
  private failed = false;

  override async appendTurn(input: NewTurnInput): Promise<ConversationTurn> {
    if (!this.failed) {
      this.failed = true;
      throw new Error("db down");
    }
    return super.appendTurn(input);
  }
}

function createOrchestrator(options: { failAnswer?: boolean; failFirstSave?: boolean } = {}) {
  const client = new FakeLlmClient({
    complete: (request) => {
      const prompt = systemPrompt(request);
      if (prompt.includes("Eres el agente de triage")) {
        return '{"agent": "general"}';
      }
      if (prompt.includes("Identifica las categorías")) {
        return '{"categories": ["Logística"]}';
      }
      if (prompt.includes("análisis de conversaciones")) {
        return JSON.stringify({
          sentiment: "neutral",
          summary: "Saludo",
          topics: ["saludo"],
          entities: [],
          intent: "consulta",
        });
      }
      if (prompt === SPECIALIST_PROFILES.general.instructions && !options.failAnswer) {
        return "¡Hola! ¿En qué te ayudo?";
      }
      throw new Error("model unavailable");
    },
    embed: () => [1, 0, 0],
  });

  const repositoryOptions: InMemoryConversationRepositoryOptions = {
    users: [[42, "user-42"]],
    now: () => new Date("2024-06-01T10:00:00.000Z"),
  };
  const repository = options.failFirstSave
    ? new FailingOnceRepository(repositoryOptions)
    : new InMemoryConversationRepository(repositoryOptions);
  const conversations = new ConversationService({
    repository,
    client,
    now: () => new Date("2024-06-01T10:00:05.000Z"),
  });
  const retriever = new Retriever(new InMemoryChunkStore(), new Embedder(client, 3), new Categorizer(client));
  const states = new InMemoryAgentStateStore();
  const router = createAgentRouter({ client, retriever, states });

  return { client, repository, conversations, states, orchestrator: new Orchestrator({ conversations, router }) };
}

describe("Orchestrator", () => {
  it("answers, stores the turn and analyses it in the background", async () => {
    const { repository, orchestrator } = createOrchestrator();

    const reply = await orchestrator.processMessage({ telegramId: 42, sessionId: 7, query: "hola" });
    await orchestrator.drain();

    expect(reply).toMatchObject({
      response: "¡Hola! ¿En qué te ayudo?",
      sessionId: 7,
      agent: "general",
      totalTokens: 20,
      failed: false,
    });
    expect(reply.executionTime).toBeGreaterThanOrEqual(0);

    const [turn] = await repository.listRecent("user-42", 7, 5);
    expect(turn).toMatchObject({
      question: "hola",
      answer: "¡Hola! ¿En qué te ayudo?",
      messageSequence: 1,
      totalTokens: 20,
      sentiment: "neutral",
      summary: "Saludo",
      topics: ["saludo"],
      metadata: {
        agent_used: "general",
        had_handoff: false,
        analysis_timestamp: "2024-06-01T10:00:05.000Z",
        entities: [],
        intent: "consulta",
      },
    });
  });

  it("sends the stored session history to the first specialist call", async () => {
    const { client, conversations, orchestrator } = createOrchestrator();
    await conversations.save({ externalId: 42, sessionId: 7, question: "¿Vendes en USA?", answer: "Sí." });

    await orchestrator.processMessage({ telegramId: 42, sessionId: 7, query: "¿Y en Canadá?" });
    await orchestrator.drain();

    const answer = client.completions.find(
      (request) => systemPrompt(request) === SPECIALIST_PROFILES.general.instructions,
    );
    expect(answer?.messages.slice(2)).toEqual([
      { role: "user", content: "¿Vendes en USA?" },
      { role: "assistant", content: "Sí." },
      { role: "user", content: "¿Y en Canadá?" },
    ]);
  });

  it("apologises without storing anything when answering fails", async () => {
    const { repository, orchestrator } = createOrchestrator({ failAnswer: true });

    const reply = await orchestrator.processMessage({ telegramId: 42, sessionId: 3, query: "hola" });

    expect(reply).toMatchObject({
      response: APOLOGY_MESSAGE,
      sessionId: 3,
      agent: null,
      totalTokens: 0,
      failed: true,
    });
    await expect(repository.listRecent("user-42", 3, 5)).resolves.toEqual([]);
  });

  it("leaves the agent history untouched when the turn cannot be stored", async () => {
    const { repository, states, orchestrator } = createOrchestrator({ failFirstSave: true });

    const failed = await orchestrator.processMessage({ telegramId: 42, sessionId: 2, query: "hola" });

    expect(failed).toMatchObject({ response: APOLOGY_MESSAGE, failed: true });
    await expect(states.get("42")).resolves.toBeNull();

    await orchestrator.processMessage({ telegramId: 42, sessionId: 2, query: "¿sigues ahí?" });
    await orchestrator.drain();

    const state = await states.get("42");
    expect(state?.messages).toEqual([
      { role: "user", content: "¿sigues ahí?" },
      { role: "assistant", content: "¡Hola! ¿En qué te ayudo?" },
    ]);
    expect((await repository.listRecent("user-42", 2, 5)).map((turn) => turn.question)).toEqual(["¿sigues ahí?"]);
  });

  it("rejects messages from unknown identities", async () => {
    const { orchestrator } = createOrchestrator();

    await expect(
      orchestrator.processMessage({ telegramId: 99, sessionId: 1, query: "hola" }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
