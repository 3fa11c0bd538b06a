import type { BackendSettings } from "../config.js";
import { AnthropicVisionClient } from "./anthropic.client.js";
import type { BedrockSessionOpener } from "./bedrock.session.js";
import { NovaVisionClient } from "./nova.client.js";
import type { VisionClientRegistry, VisionModelClient } from "./vision-model.client.js";

export function createVisionClient(
  backendId: string,
  settings: BackendSettings,
  openSession: BedrockSessionOpener,
  timeoutMs: number,
): VisionModelClient {
  switch (settings.family) {
    case "anthropic":
      return new AnthropicVisionClient(backendId, settings, openSession, timeoutMs);
    case "nova":
      return new NovaVisionClient(backendId, settings, openSession, timeoutMs);
  }
}

export function createVisionClients(
  backends: Record<string, BackendSettings>,
  openSession: BedrockSessionOpener,
  timeoutMs: number,
): VisionClientRegistry {
  const clients = new Map<string, VisionModelClient>();
  for (const [backendId, settings] of Object.entries(backends)) {
    clients.set(backendId, createVisionClient(backendId, settings, openSession, timeoutMs));
  }
  return clients;
}
