import type { ChatMessage } from "../domain/types.js";
import type { LlmClient } from "../infra/ai/types.js";
import type { Retriever } from "../services/retriever.js";
import type { SpecialistProfile } from "./profiles.js";
import type { Agent, AgentState, AgentTurn, SpecialistKind } from "./types.js";

export interface SpecialistAgentOptions {
  profile: SpecialistProfile;
  client: LlmClient;
  retriever: Retriever;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class SpecialistAgent implements Agent {
  readonly kind: SpecialistKind;

  readonly name: string;

  constructor(private readonly options: SpecialistAgentOptions) {
    this.kind = options.profile.kind;
    this.name = options.profile.name;
  }

  /**
   * Answers the latest user message. `state.messages` already ends with
   * `input`; the assistant reply is appended to the returned state.
   */
  async handle(input: string, state: AgentState): Promise<AgentTurn> {
    const documentation = await this.lookupDocumentation(input);

    const messages: ChatMessage[] = [{ role: "system", content: this.options.profile.instructions }];
    if (documentation !== null) {
      messages.push({
        role: "system",
        content: `Documentación relevante:\n\n${documentation}`,
      });
    }
    messages.push(...state.messages);

    const completion = await this.options.client.complete({
      model: this.options.model,
      temperature: this.options.temperature ?? 0.4,
      maxTokens: this.options.maxTokens ?? 1000,
      messages,
    });
    const output = completion.text.trim();

    return {
      output,
      totalTokens: completion.totalTokens,
      state: {
        activeAgent: this.kind,
        messages: [...state.messages, { role: "assistant", content: output }],
        turnCount: state.turnCount + 1,
      },
    };
  }

  private async lookupDocumentation(input: string): Promise<string | null> {
    const retrieval = this.options.profile.retrieval;
    switch (retrieval.mode) {
      case "none":
        return null;
      case "infer":
        return this.options.retriever.retrieve(input);
      case "categories":
        return this.options.retriever.retrieve(input, retrieval.categories);
    }
  }
}
