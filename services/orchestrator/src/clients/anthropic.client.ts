import type { BackendFamily } from "../config.js";
import { BedrockVisionClient, type VisionRequest } from "./vision-model.client.js";

export const ANTHROPIC_BEDROCK_VERSION = "bedrock-2023-05-31";

export class AnthropicVisionClient extends BedrockVisionClient {
  readonly family: BackendFamily = "anthropic";

  protected directBody(request: VisionRequest): Record<string, unknown> {
    return {
      anthropic_version: ANTHROPIC_BEDROCK_VERSION,
      max_tokens: this.settings.maxTokens,
      temperature: this.settings.temperature,
      messages: [
        {
          role: "user",
          content: [
            {
              type: "image",
              source: {
                type: "base64",
                media_type: request.mediaType,
                data: Buffer.from(request.imageBytes).toString("base64"),
              },
            },
            { type: "text", text: request.instructionText },
          ],
        },
      ],
    };
  }
}
