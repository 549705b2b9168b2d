/**
 * Amazon Bedrock ConverseStream integration.
 *
 * Each text delta the model streams becomes one fragment, so the synthesizer
 * starts speaking while the model is still producing the reply.
 */

import {
  BedrockRuntimeClient,
  ConverseStreamCommand,
  type ConverseStreamCommandInput,
  type ConverseStreamOutput,
  type Message,
} from "@aws-sdk/client-bedrock-runtime";
import { ConversationEntry, ResponseGenerator } from "../core/types.js";
import { alternatingTurns } from "./messages.js";
import { VOICE_SYSTEM_PROMPT } from "./prompts.js";

export interface BedrockConfig {
  modelId: string;
  region: string;
  maxTokens: number;
  client?: BedrockRuntimeClient;
}

export class BedrockResponseGenerator implements ResponseGenerator {
  readonly name = "bedrock";

  private readonly config: BedrockConfig;
  private readonly client: BedrockRuntimeClient;

  constructor(config: BedrockConfig) {
    this.config = config;
    this.client = config.client ?? new BedrockRuntimeClient({ region: config.region });
  }

  async *generate(
    history: readonly ConversationEntry[],
    utterance: string,
    signal: AbortSignal,
  ): AsyncGenerator<string> {
    const messages: Message[] = alternatingTurns(history, utterance).map((turn) => ({
      role: turn.role,
      content: [{ text: turn.content }],
    }));

    const input: ConverseStreamCommandInput = {
      modelId: this.config.modelId,
      system: [{ text: VOICE_SYSTEM_PROMPT }],
      messages,
      inferenceConfig: {
        maxTokens: this.config.maxTokens,
        temperature: 0.7,
        topP: 0.9,
      },
    };

    const response = await this.client.send(new ConverseStreamCommand(input), { abortSignal: signal });
    if (!response.stream) {
      throw new Error("bedrock_no_stream");
    }

    yield* textDeltas(response.stream);
  }
}

/** Maps ConverseStream events to their text deltas; stream-level exceptions are raised. */
export async function* textDeltas(stream: AsyncIterable<ConverseStreamOutput>): AsyncGenerator<string> {
  for await (const event of stream) {
    const text = event.contentBlockDelta?.delta?.text;
    if (text) {
      yield text;
    }

    const failure =
      event.internalServerException ??
      event.modelStreamErrorException ??
      event.validationException ??
      event.throttlingException;
    if (failure) {
      throw new Error(`bedrock_stream_${failure.name}:${failure.message ?? "unknown"}`);
    }

    if (event.messageStop) {
      return;
    }
  }
}
