import { ConversationEntry, ConversationRole } from "./types.js";

/**
 * Append-only message history of one session, oldest first.
 * Entries are frozen when appended and never change afterwards.
 */
export class ConversationState {
  private readonly turns: ConversationEntry[] = [];

  append(role: ConversationRole, text: string): ConversationEntry {
    const entry: ConversationEntry = Object.freeze({ role, text });
    this.turns.push(entry);
    return entry;
  }

  entries(): readonly ConversationEntry[] {
    return this.turns.slice();
  }

  recent(limit: number): readonly ConversationEntry[] {
    if (limit <= 0) {
      return [];
    }
    return this.turns.slice(-limit);
  }

  get length(): number {
    return this.turns.length;
  }
}
