import { Inject, Injectable } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import { APP_CONFIG } from "../tokens.js";
import type { InspectionSubject } from "../types.js";
import { decodeImage } from "./image-decoder.js";
import { fetchImage } from "./image-fetcher.js";

@Injectable()
export class ImageLoader {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  fromUrl(url: string): InspectionSubject {
    const timeoutMs = this.config.imageFetch.timeoutMs;
    return {
      ref: url,
      async load() {
        const fetched = await fetchImage(url, timeoutMs);
        return decodeImage(url, fetched.bytes);
      },
    };
  }

  fromBytes(ref: string, bytes: Buffer): InspectionSubject {
    return {
      ref,
      load: () => decodeImage(ref, bytes),
    };
  }
}
