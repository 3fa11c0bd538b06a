import { Logger } from "@nestjs/common";
import { ZodError } from "zod";

import type { BackendFamily, BackendSettings } from "../config.js";
import {
  AuthError,
  MalformedResponseError,
  NetworkError,
  ThrottleError,
  TransportError,
  errorMessage,
} from "../errors.js";
import type { ImageMediaType } from "../types.js";
import { withBedrockSession, type BedrockSession, type BedrockSessionOpener, type ConverseInput } from "./bedrock.session.js";
import { EnvelopeShapeError, extractText } from "./envelope.js";

export interface VisionRequest {
  imageBytes: Uint8Array;
  instructionText: string;
  mediaType: ImageMediaType;
}

export type SubmitAttempt = "rich" | "direct";

export interface VisionResponse {
  text: string;
  envelope: unknown;
  attempt: SubmitAttempt;
}

export interface VisionModelClient {
  readonly backendId: string;
  readonly family: BackendFamily;
  submit(request: VisionRequest): Promise<VisionResponse>;
}

export type VisionClientRegistry = ReadonlyMap<string, VisionModelClient>;

export const REVIEWER_SYSTEM_PROMPT =
  "You are a careful marketplace image reviewer. Follow the requested answer format exactly and keep the reason short.";

const IMAGE_FORMATS = {
  "image/jpeg": "jpeg",
  "image/png": "png",
  "image/gif": "gif",
  "image/webp": "webp",
} as const satisfies Record<ImageMediaType, string>;

export function imageFormatOf(mediaType: ImageMediaType): (typeof IMAGE_FORMATS)[ImageMediaType] {
  return IMAGE_FORMATS[mediaType];
}

const AUTH_ERRORS = new Set([
  "AccessDeniedException",
  "UnrecognizedClientException",
  "ExpiredTokenException",
  "InvalidSignatureException",
  "CredentialsProviderError",
]);

const THROTTLE_ERRORS = new Set(["ThrottlingException", "ServiceQuotaExceededException", "TooManyRequestsException"]);

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("$metadata" in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata === "object" && metadata !== null && "httpStatusCode" in metadata) {
    return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
  }
  return undefined;
}

export function classifyTransportFailure(backendId: string, error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (error instanceof ZodError || error instanceof SyntaxError || error instanceof EnvelopeShapeError) {
    return new MalformedResponseError(backendId, `unreadable response: ${errorMessage(error)}`);
  }
  const name = error instanceof Error ? error.name : "";
  const status = statusOf(error);
  const message = errorMessage(error);
  if (AUTH_ERRORS.has(name) || status === 401 || status === 403) {
    return new AuthError(backendId, message, status);
  }
  if (THROTTLE_ERRORS.has(name) || status === 429) {
    return new ThrottleError(backendId, message, status);
  }
  return new NetworkError(backendId, message, status);
}

/**
 * Shared submission flow for Bedrock-hosted vision models: a Converse call
 * with system prompt and inference settings, then one fallback InvokeModel
 * call with the family's native body. Each attempt has its own deadline.
 */
export abstract class BedrockVisionClient implements VisionModelClient {
  abstract readonly family: BackendFamily;
  protected readonly logger = new Logger(this.constructor.name);

  constructor(
    readonly backendId: string,
    protected readonly settings: BackendSettings,
    private readonly openSession: BedrockSessionOpener,
    private readonly timeoutMs: number,
  ) {}

  protected abstract directBody(request: VisionRequest): Record<string, unknown>;

  async submit(request: VisionRequest): Promise<VisionResponse> {
    return withBedrockSession(this.openSession, async (session) => {
      try {
        return await this.richAttempt(session, request);
      } catch (richError) {
        this.logger.warn(
          `${this.backendId}: rich request failed (${errorMessage(richError)}); retrying with direct request`,
        );
      }
      try {
        return await this.directAttempt(session, request);
      } catch (directError) {
        const failure = classifyTransportFailure(this.backendId, directError);
        this.logger.error(`${this.backendId}: direct request failed: ${failure.kind} ${failure.message}`);
        throw failure;
      }
    });
  }

  protected converseInput(request: VisionRequest): ConverseInput {
    return {
      modelId: this.settings.modelId,
      system: [{ text: REVIEWER_SYSTEM_PROMPT }],
      messages: [
        {
          role: "user",
          content: [
            { image: { format: imageFormatOf(request.mediaType), source: { bytes: request.imageBytes } } },
            { text: request.instructionText },
          ],
        },
      ],
      inferenceConfig: {
        maxTokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
      },
    };
  }

  private async richAttempt(session: BedrockSession, request: VisionRequest): Promise<VisionResponse> {
    const envelope = await this.withDeadline((signal) => session.converse(this.converseInput(request), signal));
    return { text: extractText(envelope), envelope, attempt: "rich" };
  }

  private async directAttempt(session: BedrockSession, request: VisionRequest): Promise<VisionResponse> {
    const envelope = await this.withDeadline((signal) =>
      session.invokeModel(this.settings.modelId, this.directBody(request), signal),
    );
    return { text: extractText(envelope), envelope, attempt: "direct" };
  }

  private async withDeadline<T>(call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await call(controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new NetworkError(this.backendId, `request timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
