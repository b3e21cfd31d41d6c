import type { ChatMessage } from "../domain/types.js";
import type { AgentStateStore } from "./agentStateStore.js";
import type { TriageClassifier } from "./triage.js";
import { initialAgentState, type Agent, type AgentKind, type SpecialistKind } from "./types.js";

export interface RoutedReply {
  output: string;
  agent: SpecialistKind;
  previousAgent: AgentKind;
  handoff: boolean;
  totalTokens: number;
}

export class AgentRouter {
  private readonly agents: ReadonlyMap<SpecialistKind, Agent>;

  constructor(
    agents: readonly Agent[],
    private readonly triage: TriageClassifier,
    private readonly states: AgentStateStore,
  ) {
    this.agents = new Map(agents.map((agent) => [agent.kind, agent]));
  }

  /**
   * Runs one user turn. `seedHistory` only applies when no running state
   * exists yet for `externalId`. `persist` runs before the new state is
   * stored; when it rejects, the state stays as it was.
   */
  async handle(
    externalId: number,
    message: string,
    seedHistory: ChatMessage[] = [],
    persist?: (reply: RoutedReply) => Promise<void>,
  ): Promise<RoutedReply> {
    return this.states.update(String(externalId), async (current) => {
      const state = current ?? initialAgentState(seedHistory);
      const previousAgent = state.activeAgent;
      const pending = {
        ...state,
        messages: [...state.messages, { role: "user" as const, content: message }],
      };

      const selection = await this.triage.selectNext(previousAgent, message);
      const agent = this.resolve(selection.agent);
      const turn = await agent.handle(message, pending);

      if (agent.kind !== previousAgent) {
        console.error(`[agents] ${externalId}: ${previousAgent} -> ${agent.kind}`);
      }

      const reply: RoutedReply = {
        output: turn.output,
        agent: agent.kind,
        previousAgent,
        handoff: previousAgent !== "triage" && agent.kind !== previousAgent,
        totalTokens: selection.totalTokens + turn.totalTokens,
      };
      if (persist) {
        await persist(reply);
      }

      return { state: turn.state, result: reply };
    });
  }

  private resolve(kind: SpecialistKind): Agent {
    const agent = this.agents.get(kind) ?? this.agents.get("general");
    if (!agent) {
      throw new Error(`No agent registered for "${kind}" and no general agent to fall back to.`);
    }
    return agent;
  }
}
