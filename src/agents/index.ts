import type { LlmClient } from "../infra/ai/types.js";
import type { Retriever } from "../services/retriever.js";
import { AgentRouter } from "./agentRouter.js";
import type { AgentStateStore } from "./agentStateStore.js";
import { SPECIALIST_PROFILES } from "./profiles.js";
import { SpecialistAgent } from "./specialistAgent.js";
import { TriageClassifier } from "./triage.js";
import { SPECIALIST_KINDS } from "./types.js";

export interface AgentRouterDeps {
  client: LlmClient;
  retriever: Retriever;
  states: AgentStateStore;
  chatModel?: string;
  triageModel?: string;
}

export function createAgentRouter(deps: AgentRouterDeps): AgentRouter {
  const agents = SPECIALIST_KINDS.map(
    (kind) =>
      new SpecialistAgent({
        profile: SPECIALIST_PROFILES[kind],
        client: deps.client,
        retriever: deps.retriever,
        model: deps.chatModel,
      }),
  );
  return new AgentRouter(agents, new TriageClassifier(deps.client, deps.triageModel), deps.states);
}
