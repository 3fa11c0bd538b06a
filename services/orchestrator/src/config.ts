import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { errorMessage } from "./errors.js";
import type { PipelineMode } from "./types.js";

export const heuristicSettingsSchema = z.object({
  centerExclusionRatio: z.number().min(0).max(1),
  bandThicknessRatio: z.number().positive().max(0.5),
  minBandPixels: z.number().int().positive(),
  hueFractionFloor: z.number().min(0).max(1),
  hueFractionCeiling: z.number().min(0).max(1),
  colorWeight: z.number().min(0).max(1),
  edgeWeight: z.number().min(0).max(1),
  edgeMagnitudeThreshold: z.number().positive(),
  decisionThreshold: z.number().min(0).max(1),
});

export const trustPhrasesSchema = z.object({
  borderTerms: z.array(z.string().min(1)),
  certaintyPhrases: z.array(z.string().min(1)),
});

export const backendSettingsSchema = z.object({
  family: z.enum(["anthropic", "nova"]),
  modelId: z.string().min(1),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(1),
});

export const stageBindingSchema = z.object({
  backend: z.string().min(1),
  promptId: z.string().min(1),
});

const pipelineSettingsObject = z.object({
  mode: z.enum(["hybrid", "staged"]),
  heuristic: heuristicSettingsSchema,
  trust: trustPhrasesSchema,
  backends: z.record(backendSettingsSchema),
  stages: z.object({
    primary: stageBindingSchema,
    secondary: stageBindingSchema,
    single: stageBindingSchema,
  }),
  modelTimeoutMs: z.number().int().positive(),
  batchConcurrency: z.number().int().positive(),
});

export const pipelineSettingsSchema = pipelineSettingsObject.superRefine((settings, ctx) => {
  const { colorWeight, edgeWeight, hueFractionFloor, hueFractionCeiling } = settings.heuristic;
  if (Math.abs(colorWeight + edgeWeight - 1) > 1e-6) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["heuristic"], message: "colorWeight and edgeWeight must sum to 1" });
  }
  if (edgeWeight < colorWeight) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["heuristic", "edgeWeight"], message: "edgeWeight must not be below colorWeight" });
  }
  if (hueFractionFloor >= hueFractionCeiling) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["heuristic"], message: "hueFractionFloor must be below hueFractionCeiling" });
  }
  for (const [stage, binding] of Object.entries(settings.stages)) {
    if (!settings.backends[binding.backend]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["stages", stage, "backend"],
        message: `unknown backend "${binding.backend}"`,
      });
    }
  }
});

const pipelineFileSchema = z.object({
  mode: pipelineSettingsObject.shape.mode.optional(),
  heuristic: heuristicSettingsSchema.partial().optional(),
  trust: trustPhrasesSchema.partial().optional(),
  backends: pipelineSettingsObject.shape.backends.optional(),
  stages: z
    .object({
      primary: stageBindingSchema,
      secondary: stageBindingSchema,
      single: stageBindingSchema,
    })
    .partial()
    .optional(),
  modelTimeoutMs: z.number().int().positive().optional(),
  batchConcurrency: z.number().int().positive().optional(),
});

export type HeuristicSettings = z.infer<typeof heuristicSettingsSchema>;
export type TrustPhrases = z.infer<typeof trustPhrasesSchema>;
export type BackendSettings = z.infer<typeof backendSettingsSchema>;
export type BackendFamily = BackendSettings["family"];
export type StageBinding = z.infer<typeof stageBindingSchema>;
export type PipelineSettings = z.infer<typeof pipelineSettingsObject>;
export type PipelineSettingsInput = z.infer<typeof pipelineFileSchema>;

export const defaultHeuristicSettings: HeuristicSettings = {
  centerExclusionRatio: 0.8,
  bandThicknessRatio: 0.1,
  minBandPixels: 3,
  hueFractionFloor: 0.2,
  hueFractionCeiling: 0.95,
  colorWeight: 0.4,
  edgeWeight: 0.6,
  edgeMagnitudeThreshold: 128,
  decisionThreshold: 0.15,
};

const defaults: PipelineSettings = {
  mode: "hybrid",
  heuristic: defaultHeuristicSettings,
  trust: {
    borderTerms: ["테두리", "윤곽선", "경계선", "네모", "라인", "border", "frame", "outline", "boundary", "edge", "line"],
    certaintyPhrases: ["테두리가 전혀 없", "border가 전혀 없", "완전히 깨끗한", "전혀 문제없", "no border at all", "completely clean"],
  },
  backends: {
    "nova-pro": { family: "nova", modelId: "us.amazon.nova-pro-v1:0", maxTokens: 1000, temperature: 0 },
    "claude-sonnet": {
      family: "anthropic",
      modelId: "us.anthropic.claude-3-7-sonnet-20250219-v1:0",
      maxTokens: 1000,
      temperature: 0,
    },
  },
  stages: {
    primary: { backend: "nova-pro", promptId: "full-policy-v2" },
    secondary: { backend: "claude-sonnet", promptId: "border-strict-v1" },
    single: { backend: "claude-sonnet", promptId: "full-policy-v2" },
  },
  modelTimeoutMs: 60000,
  batchConcurrency: 4,
};

export const resolvePipelineSettings = (partial: PipelineSettingsInput = {}): PipelineSettings => {
  const merged: PipelineSettings = {
    mode: partial.mode ?? defaults.mode,
    heuristic: { ...defaults.heuristic, ...partial.heuristic },
    trust: {
      borderTerms: partial.trust?.borderTerms ?? defaults.trust.borderTerms,
      certaintyPhrases: partial.trust?.certaintyPhrases ?? defaults.trust.certaintyPhrases,
    },
    backends: partial.backends ?? defaults.backends,
    stages: {
      primary: partial.stages?.primary ?? defaults.stages.primary,
      secondary: partial.stages?.secondary ?? defaults.stages.secondary,
      single: partial.stages?.single ?? defaults.stages.single,
    },
    modelTimeoutMs: partial.modelTimeoutMs ?? defaults.modelTimeoutMs,
    batchConcurrency: partial.batchConcurrency ?? defaults.batchConcurrency,
  };

  return pipelineSettingsSchema.parse(merged);
};

export interface AwsConfig {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export interface DatabaseConfig {
  url?: string;
}

export interface ImageFetchConfig {
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  aws: AwsConfig;
  database: DatabaseConfig;
  imageFetch: ImageFetchConfig;
  promptsPath: string;
  pipeline: PipelineSettings;
}

/** Nearest directory at or above `start` holding a package.json; the same from `src/` and `dist/`. */
export function findPackageRoot(start: string): string {
  let dir = start;
  while (!existsSync(join(dir, "package.json"))) {
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${start}`);
    }
    dir = parent;
  }
  return dir;
}

const configDir = join(findPackageRoot(dirname(fileURLToPath(import.meta.url))), "config");

export const defaultPipelinePath = join(configDir, "pipeline.json");
export const defaultPromptsPath = join(configDir, "prompts.json");

function readPipelineFile(path: string | undefined): PipelineSettingsInput {
  const target = path ?? defaultPipelinePath;
  if (!path && !existsSync(target)) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(target, "utf-8"));
  } catch (error) {
    throw new Error(`Failed to read pipeline settings from ${target}: ${errorMessage(error)}`);
  }
  return pipelineFileSchema.parse(raw);
}

function optionalNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function optionalMode(value: string | undefined): PipelineMode | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  if (value === "hybrid" || value === "staged") {
    return value;
  }
  throw new Error(`PIPELINE_MODE must be "hybrid" or "staged", got "${value}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fromFile = readPipelineFile(env.PIPELINE_CONFIG_PATH);
  const pipeline = resolvePipelineSettings({
    ...fromFile,
    mode: optionalMode(env.PIPELINE_MODE) ?? fromFile.mode,
    modelTimeoutMs: optionalNumber(env.MODEL_TIMEOUT_MS, "MODEL_TIMEOUT_MS") ?? fromFile.modelTimeoutMs,
    batchConcurrency: optionalNumber(env.BATCH_CONCURRENCY, "BATCH_CONCURRENCY") ?? fromFile.batchConcurrency,
  });

  return {
    port: Number(env.PORT ?? "8080"),
    aws: {
      region: env.AWS_REGION ?? "us-east-1",
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    },
    database: {
      url: env.DATABASE_URL,
    },
    imageFetch: {
      timeoutMs: optionalNumber(env.IMAGE_FETCH_TIMEOUT_MS, "IMAGE_FETCH_TIMEOUT_MS") ?? 30000,
    },
    promptsPath: env.PROMPTS_PATH ?? defaultPromptsPath,
    pipeline,
  };
}
