import { ConversationEntry, ResponseGenerator } from "../core/types.js";
import { chunkText, streamFromChunks } from "./chunking.js";
import { alternatingTurns, ChatTurn } from "./messages.js";
import { VOICE_SYSTEM_PROMPT } from "./prompts.js";

export interface AnthropicConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

// ---------------------------------------------------------------------------
// Anthropic API wire types
// ---------------------------------------------------------------------------

interface AnthropicTextBlock {
  type: "text";
  text: string;
}

interface AnthropicOtherBlock {
  type: "tool_use" | "thinking";
}

interface AnthropicMessageResponse {
  content?: Array<AnthropicTextBlock | AnthropicOtherBlock>;
  stop_reason?: string;
}

// ---------------------------------------------------------------------------
// Generator implementation
// ---------------------------------------------------------------------------

/**
 * Asks the Messages API for the whole reply, then replays it as word-boundary
 * fragments of 30–80 characters for the synthesizer.
 */
export class AnthropicResponseGenerator implements ResponseGenerator {
  readonly name = "anthropic";

  private readonly config: AnthropicConfig;

  constructor(config: AnthropicConfig) {
    this.config = config;
  }

  async *generate(
    history: readonly ConversationEntry[],
    utterance: string,
    signal: AbortSignal,
  ): AsyncGenerator<string> {
    const fullText = await this.complete(alternatingTurns(history, utterance), signal);
    yield* streamFromChunks(chunkText(fullText, 30, 80), signal);
  }

  private async complete(messages: ChatTurn[], signal: AbortSignal): Promise<string> {
    const doFetch = this.config.fetchImpl ?? fetch;
    const response = await doFetch("https://api.anthropic.com/v1/messages", {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        system: VOICE_SYSTEM_PROMPT,
        messages,
      }),
      signal: withTimeout(signal, this.config.timeoutMs ?? 30_000),
    });

    if (!response.ok) {
      const bodyText = await response.text();
      throw new Error(`anthropic_http_${response.status}:${bodyText.slice(0, 120)}`);
    }

    const payload = (await response.json()) as AnthropicMessageResponse;
    return (payload.content ?? [])
      .filter((block): block is AnthropicTextBlock => block.type === "text")
      .map((block) => block.text.trim())
      .join("\n")
      .trim();
  }
}

function withTimeout(signal: AbortSignal, timeoutMs: number): AbortSignal {
  const controller = new AbortController();
  const timeout = AbortSignal.timeout(timeoutMs);
  for (const source of [signal, timeout]) {
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    source.addEventListener("abort", () => controller.abort(source.reason), { once: true });
  }
  return controller.signal;
}
