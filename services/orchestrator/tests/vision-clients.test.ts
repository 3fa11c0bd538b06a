import { describe, expect, it, vi } from "vitest";

import { AnthropicVisionClient } from "../src/clients/anthropic.client.js";
import type { BedrockSession, ConverseInput } from "../src/clients/bedrock.session.js";
import { EnvelopeShapeError, extractText } from "../src/clients/envelope.js";
import { NovaVisionClient } from "../src/clients/nova.client.js";
import { createVisionClient } from "../src/clients/vision-client.factory.js";
import { REVIEWER_SYSTEM_PROMPT, classifyTransportFailure, type VisionRequest } from "../src/clients/vision-model.client.js";
import type { BackendSettings } from "../src/config.js";
import { AuthError, MalformedResponseError, NetworkError, ThrottleError } from "../src/errors.js";

const settings: BackendSettings = { family: "anthropic", modelId: "test-model", maxTokens: 256, temperature: 0 };

const request: VisionRequest = {
  imageBytes: Buffer.from("png-bytes"),
  instructionText: "check the border",
  mediaType: "image/png",
};

const nested = (text: string) => ({ output: { message: { role: "assistant", content: [{ text }] } } });

const named = (name: string, message = name) => Object.assign(new Error(message), { name });

function fakeSession(
  converse: (input: ConverseInput, signal: AbortSignal) => Promise<unknown>,
  invokeModel: (modelId: string, body: Record<string, unknown>, signal: AbortSignal) => Promise<unknown> = async () => {
    throw new Error("direct call not expected");
  },
) {
  const session = {
    converse: vi.fn(converse),
    invokeModel: vi.fn(invokeModel),
    close: vi.fn(),
  } satisfies BedrockSession;
  return { session, open: () => session };
}

const rejectOnAbort = (_input: unknown, signal: AbortSignal) =>
  new Promise<never>((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(named("AbortError", "aborted")));
  });

describe("extractText", () => {
  it("reads the nested, tagged and bare shapes", () => {
    expect(extractText(nested("result: true"))).toBe("result: true");
    expect(extractText({ content: [{ type: "tool_use" }, { type: "text", text: "결과: false" }] })).toBe("결과: false");
    expect(extractText({ text: "plain" })).toBe("plain");
  });

  it("rejects envelopes without text", () => {
    expect(() => extractText({ content: [{ type: "tool_use" }] })).toThrow(EnvelopeShapeError);
    expect(() => extractText({ unexpected: 1 })).toThrow();
  });
});

describe("BedrockVisionClient", () => {
  it("returns the rich Converse answer and closes the session", async () => {
    const { session, open } = fakeSession(async () => nested("result: true\nreason: clean"));
    const client = new AnthropicVisionClient("claude-sonnet", settings, open, 1000);

    const response = await client.submit(request);

    expect(response).toMatchObject({ text: "result: true\nreason: clean", attempt: "rich" });
    expect(session.invokeModel).not.toHaveBeenCalled();
    expect(session.close).toHaveBeenCalledTimes(1);
    const input = session.converse.mock.calls[0][0];
    expect(input.modelId).toBe("test-model");
    expect(input.system).toEqual([{ text: REVIEWER_SYSTEM_PROMPT }]);
    expect(input.inferenceConfig).toEqual({ maxTokens: 256, temperature: 0 });
    expect(input.messages?.[0].content?.[1]).toEqual({ text: "check the border" });
  });

  it("retries once with the anthropic messages body", async () => {
    const { session, open } = fakeSession(
      async () => {
        throw named("ValidationException", "system prompt not supported");
      },
      async () => ({ content: [{ type: "text", text: "결과: false\n사유: 테두리" }] }),
    );
    const client = new AnthropicVisionClient("claude-sonnet", settings, open, 1000);

    const response = await client.submit(request);

    expect(response.attempt).toBe("direct");
    expect(response.text).toBe("결과: false\n사유: 테두리");
    expect(session.invokeModel).toHaveBeenCalledTimes(1);
    const [modelId, body] = session.invokeModel.mock.calls[0];
    expect(modelId).toBe("test-model");
    expect(body).toEqual({
      anthropic_version: "bedrock-2023-05-31",
      max_tokens: 256,
      temperature: 0,
      messages: [
        {
          role: "user",
          content: [
            {
              type: "image",
              source: { type: "base64", media_type: "image/png", data: Buffer.from("png-bytes").toString("base64") },
            },
            { type: "text", text: "check the border" },
          ],
        },
      ],
    });
  });

  it("retries once with the nova messages-v1 body", async () => {
    const { session, open } = fakeSession(
      async () => {
        throw new Error("converse failed");
      },
      async () => nested("result: true"),
    );
    const client = new NovaVisionClient("nova-pro", { ...settings, family: "nova" }, open, 1000);

    const response = await client.submit(request);

    expect(response).toMatchObject({ text: "result: true", attempt: "direct" });
    expect(session.invokeModel.mock.calls[0][1]).toMatchObject({
      schemaVersion: "messages-v1",
      inferenceConfig: { max_new_tokens: 256, temperature: 0 },
      messages: [{ role: "user", content: [{ image: { format: "png" } }, { text: "check the border" }] }],
    });
  });

  it("classifies the direct failure after the retry", async () => {
    const cases = [
      { error: named("AccessDeniedException"), expected: AuthError },
      { error: Object.assign(new Error("slow down"), { $metadata: { httpStatusCode: 429 } }), expected: ThrottleError },
      { error: named("ThrottlingException"), expected: ThrottleError },
      { error: new Error("socket hang up"), expected: NetworkError },
    ];

    for (const { error, expected } of cases) {
      const { session, open } = fakeSession(
        async () => {
          throw error;
        },
        async () => {
          throw error;
        },
      );
      const client = new AnthropicVisionClient("claude-sonnet", settings, open, 1000);

      await expect(client.submit(request)).rejects.toBeInstanceOf(expected);
      expect(session.converse).toHaveBeenCalledTimes(1);
      expect(session.invokeModel).toHaveBeenCalledTimes(1);
      expect(session.close).toHaveBeenCalledTimes(1);
    }
  });

  it("reports unreadable envelopes as malformed", async () => {
    const { open } = fakeSession(
      async () => ({ unexpected: true }),
      async () => ({ content: [] }),
    );
    const client = new NovaVisionClient("nova-pro", { ...settings, family: "nova" }, open, 1000);

    await expect(client.submit(request)).rejects.toMatchObject({ kind: "malformed_response", backendId: "nova-pro" });
  });

  it("times out each attempt separately", async () => {
    const { session, open } = fakeSession(rejectOnAbort, (_modelId, _body, signal) => rejectOnAbort(undefined, signal));
    const client = new AnthropicVisionClient("claude-sonnet", settings, open, 20);

    const failure = client.submit(request);

    await expect(failure).rejects.toBeInstanceOf(NetworkError);
    await expect(failure).rejects.toThrow("request timed out after 20ms");
    expect(session.invokeModel).toHaveBeenCalledTimes(1);
    expect(session.close).toHaveBeenCalledTimes(1);
  });
});

describe("classifyTransportFailure", () => {
  it("maps http status codes", () => {
    expect(classifyTransportFailure("b", Object.assign(new Error("x"), { $metadata: { httpStatusCode: 403 } }))).toBeInstanceOf(
      AuthError,
    );
    expect(classifyTransportFailure("b", new SyntaxError("Unexpected token"))).toBeInstanceOf(MalformedResponseError);
    expect(classifyTransportFailure("b", "plain string").kind).toBe("network");
  });
});

describe("createVisionClient", () => {
  it("picks the implementation from the configured family only", () => {
    const open = () => fakeSession(async () => nested("")).session;

    expect(createVisionClient("a", { ...settings, family: "nova", modelId: "claude-lookalike" }, open, 10)).toBeInstanceOf(
      NovaVisionClient,
    );
    expect(createVisionClient("b", { ...settings, family: "anthropic", modelId: "nova-lookalike" }, open, 10)).toBeInstanceOf(
      AnthropicVisionClient,
    );
  });
});
