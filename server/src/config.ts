import { EnrichmentPolicy } from "./core/enricher.js";
import { UtterancePolicy } from "./core/types.js";
import { GeneratorConfig, GeneratorKind } from "./providers/index.js";

export interface RelayConfig {
  port: number;
  maxEventBytes: number;
  rateLimitPerMinute: number;
  historyLimit: number;
  utterancePolicy: UtterancePolicy;
  enrichmentPolicy: EnrichmentPolicy;
  urgentQueueCapacity: number;
  agentName: string;
  generator: GeneratorConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  return {
    port: parseInteger(env.PORT, 8080),
    maxEventBytes: parseInteger(env.MAX_EVENT_BYTES, 65_536),
    rateLimitPerMinute: parseInteger(env.SESSION_RATE_LIMIT_PER_MIN, 120),
    historyLimit: parseInteger(env.HISTORY_LIMIT, 20),
    utterancePolicy: parseChoice(env.UTTERANCE_POLICY, ["interrupt", "drop"], "interrupt"),
    enrichmentPolicy: parseChoice(env.ENRICHMENT_POLICY, ["selective", "global"], "selective"),
    urgentQueueCapacity: parseInteger(env.URGENT_QUEUE_CAPACITY, 256),
    agentName: env.AGENT_NAME?.trim() || "voice-relay",
    generator: {
      kind: parseChoice<GeneratorKind>(env.RESPONSE_GENERATOR, ["template", "anthropic", "bedrock"], "template"),
      anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
      anthropicModel: env.ANTHROPIC_MODEL ?? "claude-haiku-4-5",
      anthropicMaxTokens: parseInteger(env.ANTHROPIC_MAX_TOKENS, 512),
      bedrockModelId: env.BEDROCK_MODEL_ID ?? "amazon.nova-lite-v1:0",
      bedrockMaxTokens: parseInteger(env.BEDROCK_MAX_TOKENS, 512),
      awsRegion: env.AWS_REGION ?? "us-east-1",
    },
  };
}

export function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}

export function parseChoice<T extends string>(
  raw: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  const value = raw?.trim().toLowerCase();
  return choices.find((choice) => choice === value) ?? fallback;
}
