import { z } from "zod";
import { describeError } from "../domain/errors.js";
import { completeJson } from "../infra/ai/structured.js";
import type { LlmClient } from "../infra/ai/types.js";
import { SPECIALIST_PROFILES } from "./profiles.js";
import { isSpecialistKind, SPECIALIST_KINDS, type AgentKind, type SpecialistKind } from "./types.js";

const selectionSchema = z.object({ agent: z.unknown() });

export interface AgentSelection {
  agent: SpecialistKind;
  /** True when the classifier returned a usable answer. */
  classified: boolean;
  totalTokens: number;
}

/** Where control stays when the classifier cannot decide. */
export function fallbackAgent(current: AgentKind): SpecialistKind {
  return current === "triage" ? "general" : current;
}

export class TriageClassifier {
  constructor(
    private readonly client: LlmClient,
    private readonly model?: string,
  ) {}

  async selectNext(current: AgentKind, query: string): Promise<AgentSelection> {
    const candidates = SPECIALIST_KINDS.map(
      (kind) => `- ${kind}: ${SPECIALIST_PROFILES[kind].handoffDescription}`,
    ).join("\n");

    try {
      const { value, totalTokens } = await completeJson(
        this.client,
        {
          model: this.model,
          temperature: 0,
          messages: [
            {
              role: "system",
              content: [
                "Eres el agente de triage de un asistente para vendedores en Amazon USA.",
                "Elige el especialista que debe atender el siguiente mensaje del usuario.",
                "",
                "Especialistas disponibles:",
                candidates,
                "",
                `Especialista activo: ${current}. Mantenlo si el mensaje continúa el mismo tema.`,
                'Devuelve un objeto JSON con la clave "agent", por ejemplo: {"agent": "logistics"}',
              ].join("\n"),
            },
            { role: "user", content: query },
          ],
        },
        selectionSchema,
      );

      if (isSpecialistKind(value.agent)) {
        return { agent: value.agent, classified: true, totalTokens };
      }
      console.warn(`[triage] Unknown agent ${JSON.stringify(value.agent)}; keeping ${current}.`);
      return { agent: fallbackAgent(current), classified: false, totalTokens };
    } catch (error) {
      console.error(`[triage] Error selecting agent: ${describeError(error)}`);
      return { agent: fallbackAgent(current), classified: false, totalTokens: 0 };
    }
  }
}
