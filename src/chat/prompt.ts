import type { EngineMessage } from "../services/engine.js";
import type { Turn } from "../types.js";

export type PromptPreamble = {
  persona: string[];
  /** Site content gathered by the refresh job; optional. */
  knowledge?: string;
};

export function buildSystemPrompt(preamble: PromptPreamble): string {
  const sections = [preamble.persona.join("\n")];
  if (preamble.knowledge) {
    sections.push(`Use the following university data to answer questions:\n${preamble.knowledge}`);
  }
  return sections.join("\n\n");
}

/**
 * System preamble, then context turns oldest first, then the question. The
 * same inputs always produce the same message list.
 */
export function buildMessages(
  systemPrompt: string,
  context: readonly Turn[],
  question: string
): EngineMessage[] {
  return [
    { role: "system", content: systemPrompt },
    ...context.map((turn): EngineMessage => ({ role: turn.role, content: turn.content })),
    { role: "user", content: question }
  ];
}
