import { z } from "zod";

const contentBlockSchema = z
  .object({
    type: z.string().optional(),
    text: z.string().optional(),
  })
  .passthrough();

const blockListSchema = z.array(contentBlockSchema).min(1);

// Converse responses and direct nova responses share this nesting.
export const nestedEnvelopeSchema = z.object({
  output: z.object({
    message: z.object({
      content: blockListSchema,
    }),
  }),
});

// Direct anthropic-family responses.
export const taggedEnvelopeSchema = z.object({
  content: blockListSchema,
});

export const bareTextEnvelopeSchema = z.object({
  text: z.string(),
});

export const envelopeSchema = z.union([nestedEnvelopeSchema, taggedEnvelopeSchema, bareTextEnvelopeSchema]);

export class EnvelopeShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnvelopeShapeError";
  }
}

type ContentBlock = z.infer<typeof contentBlockSchema>;

function textOf(blocks: ContentBlock[]): string {
  const texts = blocks
    .filter((block) => block.type === undefined || block.type === "text")
    .map((block) => block.text)
    .filter((text): text is string => typeof text === "string");
  if (texts.length === 0) {
    throw new EnvelopeShapeError("response carried no text content block");
  }
  return texts.join("\n");
}

/** Pulls the reply text out of any supported response shape, whichever call produced it. */
export function extractText(envelope: unknown): string {
  const parsed = envelopeSchema.parse(envelope);
  if ("output" in parsed) {
    return textOf(parsed.output.message.content);
  }
  if ("content" in parsed) {
    return textOf(parsed.content);
  }
  return parsed.text;
}
