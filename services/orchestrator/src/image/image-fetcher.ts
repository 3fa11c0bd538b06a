import fetch from "node-fetch";

import { InputError, errorMessage } from "../errors.js";

export interface FetchedImage {
  bytes: Buffer;
  contentType?: string;
}

export function parseImageUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new InputError("invalid_url", `not a valid URL: ${raw}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InputError("invalid_url", `unsupported URL scheme ${url.protocol} in ${raw}`);
  }
  return url;
}

export async function fetchImage(raw: string, timeoutMs: number): Promise<FetchedImage> {
  const url = parseImageUrl(raw);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url.toString(), {
      headers: { Accept: "image/*" },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new InputError("fetch_failed", `image download failed: HTTP ${response.status} for ${raw}`);
    }
    const contentType = response.headers.get("content-type")?.toLowerCase();
    if (contentType && !contentType.startsWith("image/")) {
      throw new InputError("not_an_image", `response is not an image (content-type ${contentType})`);
    }
    const bytes = Buffer.from(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new InputError("not_an_image", `image body is empty for ${raw}`);
    }
    return { bytes, contentType };
  } catch (error) {
    if (error instanceof InputError) {
      throw error;
    }
    if (error instanceof Error && error.name === "AbortError") {
      throw new InputError("fetch_failed", `image download timed out after ${timeoutMs}ms: ${raw}`);
    }
    throw new InputError("fetch_failed", `image download failed for ${raw}: ${errorMessage(error)}`);
  } finally {
    clearTimeout(timeout);
  }
}
