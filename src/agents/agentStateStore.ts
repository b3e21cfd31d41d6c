import { KeyedMutex } from "../utils/keyedMutex.js";
import type { AgentState } from "./types.js";

/**
 * Running agent conversations keyed by external user id. `update` gives the
 * caller exclusive access to one key for a read-modify-write.
 */
export interface AgentStateStore {
  get(key: string): Promise<AgentState | null>;
  update<T>(
    key: string,
    task: (current: AgentState | null) => Promise<{ state: AgentState; result: T }>,
  ): Promise<T>;
}

export class InMemoryAgentStateStore implements AgentStateStore {
  private readonly states = new Map<string, AgentState>();

  private readonly locks = new KeyedMutex();

  async get(key: string): Promise<AgentState | null> {
    const state = this.states.get(key);
    return state ? cloneState(state) : null;
  }

  async update<T>(
    key: string,
    task: (current: AgentState | null) => Promise<{ state: AgentState; result: T }>,
  ): Promise<T> {
    return this.locks.runExclusive(key, async () => {
      const current = this.states.get(key);
      const { state, result } = await task(current ? cloneState(current) : null);
      this.states.set(key, cloneState(state));
      return result;
    });
  }
}

function cloneState(state: AgentState): AgentState {
  return { ...state, messages: state.messages.map((message) => ({ ...message })) };
}
