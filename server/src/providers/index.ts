import { ResponseGenerator } from "../core/types.js";
import { AnthropicResponseGenerator } from "./anthropicGenerator.js";
import { BedrockResponseGenerator } from "./bedrockGenerator.js";
import { TemplateResponseGenerator } from "./templateGenerator.js";

export type GeneratorKind = "template" | "anthropic" | "bedrock";

export interface GeneratorConfig {
  kind: GeneratorKind;
  anthropicApiKey?: string;
  anthropicModel: string;
  anthropicMaxTokens: number;
  bedrockModelId: string;
  bedrockMaxTokens: number;
  awsRegion: string;
}

export function buildGenerator(config: GeneratorConfig): ResponseGenerator {
  switch (config.kind) {
    case "bedrock":
      return new BedrockResponseGenerator({
        modelId: config.bedrockModelId,
        region: config.awsRegion,
        maxTokens: config.bedrockMaxTokens,
      });

    case "anthropic":
      if (!config.anthropicApiKey) {
        throw new Error("ANTHROPIC_API_KEY is required when RESPONSE_GENERATOR=anthropic");
      }
      return new AnthropicResponseGenerator({
        apiKey: config.anthropicApiKey,
        model: config.anthropicModel,
        maxTokens: config.anthropicMaxTokens,
      });

    case "template":
      return new TemplateResponseGenerator();
  }
}
