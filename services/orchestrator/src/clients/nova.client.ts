import type { BackendFamily } from "../config.js";
import { BedrockVisionClient, imageFormatOf, type VisionRequest } from "./vision-model.client.js";

export class NovaVisionClient extends BedrockVisionClient {
  readonly family: BackendFamily = "nova";

  protected directBody(request: VisionRequest): Record<string, unknown> {
    return {
      schemaVersion: "messages-v1",
      messages: [
        {
          role: "user",
          content: [
            {
              image: {
                format: imageFormatOf(request.mediaType),
                source: { bytes: Buffer.from(request.imageBytes).toString("base64") },
              },
            },
            { text: request.instructionText },
          ],
        },
      ],
      inferenceConfig: {
        max_new_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
      },
    };
  }
}
