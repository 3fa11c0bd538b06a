import { vi } from "vitest";

import type { VisionModelClient, VisionRequest, VisionResponse } from "../src/clients/vision-model.client.js";
import { defaultPromptsPath, resolvePipelineSettings, type AppConfig, type BackendFamily, type PipelineSettingsInput } from "../src/config.js";
import { PromptTable } from "../src/prompts.js";
import type { ImageSample, InspectionSubject, RgbRaster } from "../src/types.js";

export type Rgb = [number, number, number];

export const WHITE: Rgb = [255, 255, 255];
export const RED: Rgb = [255, 0, 0];

export function solidRaster(width: number, height: number, color: Rgb): RgbRaster {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i += 1) {
    data.set(color, i * 3);
  }
  return { width, height, data };
}

export function framedRaster(width: number, height: number, frame: number, frameColor: Rgb, fill: Rgb): RgbRaster {
  const raster = solidRaster(width, height, fill);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      if (x < frame || y < frame || x >= width - frame || y >= height - frame) {
        raster.data.set(frameColor, (y * width + x) * 3);
      }
    }
  }
  return raster;
}

export function testConfig(pipeline: PipelineSettingsInput = {}): AppConfig {
  return {
    port: 0,
    aws: { region: "us-east-1", accessKeyId: "test-key", secretAccessKey: "test-secret" },
    database: {},
    imageFetch: { timeoutMs: 2000 },
    promptsPath: defaultPromptsPath,
    pipeline: resolvePipelineSettings(pipeline),
  };
}

export const testPrompts = new PromptTable([
  { id: "full-policy-v2", name: "full", description: "", text: "check the border and background text" },
  { id: "border-strict-v1", name: "strict", description: "", text: "check only the perimeter" },
]);

export function sampleFor(ref: string, raster: RgbRaster | null, encoded: Buffer = Buffer.from(ref)): ImageSample {
  return { ref, raster, encoded, mediaType: "image/png", format: "png" };
}

export function subjectFor(ref: string, raster: RgbRaster | null, encoded?: Buffer): InspectionSubject {
  return { ref, load: async () => sampleFor(ref, raster, encoded) };
}

export const reply = (text: string): VisionResponse => ({ text, envelope: { text }, attempt: "rich" });

/** Client answering from a fixed script; strings are model replies, errors are thrown. */
export function scriptedClient(backendId: string, family: BackendFamily, ...script: Array<string | Error>) {
  const queue = [...script];
  const submit = vi.fn(async (_request: VisionRequest): Promise<VisionResponse> => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error(`${backendId}: no scripted reply left`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return reply(next);
  });
  return { backendId, family, submit } satisfies VisionModelClient;
}

export function registry(...clients: VisionModelClient[]): Map<string, VisionModelClient> {
  return new Map(clients.map((client) => [client.backendId, client]));
}
