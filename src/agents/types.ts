import type { ChatMessage } from "../domain/types.js";

export const SPECIALIST_KINDS = ["general", "logistics", "marketing", "onboarding"] as const;

export type SpecialistKind = (typeof SPECIALIST_KINDS)[number];

/** `triage` is the entry state; it never answers on its own. */
export type AgentKind = "triage" | SpecialistKind;

export interface AgentState {
  activeAgent: AgentKind;
  /** Role-tagged history, oldest first, including the pending user turn. */
  messages: ChatMessage[];
  turnCount: number;
}

export interface AgentTurn {
  output: string;
  state: AgentState;
  totalTokens: number;
}

export interface Agent {
  readonly kind: SpecialistKind;
  readonly name: string;
  handle(input: string, state: AgentState): Promise<AgentTurn>;
}

export function isSpecialistKind(value: unknown): value is SpecialistKind {
  return typeof value === "string" && SPECIALIST_KINDS.some((kind) => kind === value);
}

export function initialAgentState(history: ChatMessage[] = []): AgentState {
  return { activeAgent: "triage", messages: [...history], turnCount: 0 };
}
