import { ConversationEntry, ConversationRole } from "../core/types.js";

export interface ChatTurn {
  role: ConversationRole;
  content: string;
}

/**
 * Chat APIs want roles to alternate, starting with the user. Cancelled turns
 * leave consecutive user entries behind, so runs of one role are merged and
 * anything before the first user entry is dropped.
 */
export function alternatingTurns(history: readonly ConversationEntry[], utterance: string): ChatTurn[] {
  const turns: ChatTurn[] = [];

  for (const entry of [...history, { role: "user" as const, text: utterance }]) {
    const last = turns[turns.length - 1];
    if (last && last.role === entry.role) {
      last.content = `${last.content}\n${entry.text}`;
    } else if (turns.length > 0 || entry.role === "user") {
      turns.push({ role: entry.role, content: entry.text });
    }
  }

  return turns;
}
