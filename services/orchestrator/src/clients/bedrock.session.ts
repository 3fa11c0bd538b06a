import {
  BedrockRuntimeClient,
  ConverseCommand,
  InvokeModelCommand,
  type ConverseCommandInput,
} from "@aws-sdk/client-bedrock-runtime";

import type { AwsConfig } from "../config.js";

export type ConverseInput = ConverseCommandInput;

/** One Bedrock connection, held for the duration of a single submission. */
export interface BedrockSession {
  converse(input: ConverseInput, signal: AbortSignal): Promise<unknown>;
  invokeModel(modelId: string, body: Record<string, unknown>, signal: AbortSignal): Promise<unknown>;
  close(): void;
}

export type BedrockSessionOpener = () => BedrockSession;

export async function withBedrockSession<T>(
  open: BedrockSessionOpener,
  use: (session: BedrockSession) => Promise<T>,
): Promise<T> {
  const session = open();
  try {
    return await use(session);
  } finally {
    session.close();
  }
}

const decoder = new TextDecoder();

export function sdkSessionOpener(aws: AwsConfig): BedrockSessionOpener {
  const credentials =
    aws.accessKeyId && aws.secretAccessKey
      ? { accessKeyId: aws.accessKeyId, secretAccessKey: aws.secretAccessKey }
      : undefined;

  return () => {
    const client = new BedrockRuntimeClient({ region: aws.region, credentials });
    return {
      async converse(input, signal) {
        const output = await client.send(new ConverseCommand(input), { abortSignal: signal });
        return { output: output.output, stopReason: output.stopReason, usage: output.usage };
      },
      async invokeModel(modelId, body, signal) {
        const output = await client.send(
          new InvokeModelCommand({
            modelId,
            contentType: "application/json",
            accept: "application/json",
            body: JSON.stringify(body),
          }),
          { abortSignal: signal },
        );
        const parsed: unknown = JSON.parse(decoder.decode(output.body));
        return parsed;
      },
      close() {
        client.destroy();
      },
    };
  };
}
