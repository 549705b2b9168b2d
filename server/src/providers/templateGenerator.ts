import { ConversationEntry, ResponseGenerator } from "../core/types.js";
import { splitWords, streamFromChunks } from "./chunking.js";

interface CannedReply {
  keywords: readonly string[];
  reply: string;
}

const CANNED_REPLIES: readonly CannedReply[] = [
  {
    keywords: ["how are you"],
    reply: "I'm doing great, thank you for asking! I'm a voice assistant ready to help you. How are you doing?",
  },
  {
    keywords: ["hello", "hi"],
    reply:
      "Hello! How can I help you today? I'm here to assist you with any questions you might have. " +
      "Whether you need information, advice, or just want to chat, feel free to ask me anything.",
  },
  {
    keywords: ["weather"],
    reply:
      "I don't have access to real-time weather data, but I'd be happy to help you with something else. " +
      "What would you like to know?",
  },
  {
    keywords: ["goodbye", "bye"],
    reply: "Goodbye! It was nice talking to you. Have a wonderful day!",
  },
];

/** Keyword-matched canned replies, streamed one word at a time. */
export class TemplateResponseGenerator implements ResponseGenerator {
  readonly name = "template";

  reply(utterance: string): string {
    const lowered = utterance.toLowerCase();
    const words = new Set(lowered.match(/[a-z']+/g) ?? []);

    const match = CANNED_REPLIES.find(({ keywords }) =>
      keywords.some((keyword) => (keyword.includes(" ") ? lowered.includes(keyword) : words.has(keyword))),
    );
    if (match) {
      return match.reply;
    }
    if (words.size === 0) {
      return "Sorry, I didn't catch that. Could you say it again?";
    }

    return `You said: ${utterance.trim()}. That's interesting! Tell me more, or ask me anything.`;
  }

  generate(
    _history: readonly ConversationEntry[],
    utterance: string,
    signal: AbortSignal,
  ): AsyncIterable<string> {
    return streamFromChunks(splitWords(this.reply(utterance)), signal);
  }
}
