/**
 * Imaging tool wrapper.
 *
 * The captioning model is an external service. Whatever it does, the case
 * context always receives a usable imaging finding: failures and empty
 * captions are replaced by a generic demo caption.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { z } from "zod";
import { httpRequest, parseJson } from "./backends/http.js";
import { createLogger } from "./logger.js";

const log = createLogger("imaging");

export interface ImageInput {
  data: Uint8Array;
  mimeType: string;
}

export interface ImageCaptioner {
  readonly name: string;
  caption(image: ImageInput): Promise<string>;
}

export const SUPPORTED_IMAGE_TYPES: Readonly<Record<string, string>> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".bmp": "image/bmp",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".gif": "image/gif",
};

export const DEMO_CAPTIONS: readonly string[] = [
  "Chest X-ray demonstrates clear lung fields with no acute cardiopulmonary abnormalities. Heart size appears normal.",
  "The radiographic examination shows normal cardiac silhouette and no evidence of pneumonia or pleural effusion.",
  "Bilateral lung fields are clear without focal consolidation. Cardiac outline is within normal limits.",
  "No acute abnormalities detected in the chest radiograph. Recommend clinical correlation.",
  "The imaging study reveals normal findings consistent with healthy lung tissue and cardiac structure.",
];

/** Read an image file. Throws for extensions outside SUPPORTED_IMAGE_TYPES. */
export async function loadImage(path: string): Promise<ImageInput> {
  const ext = extname(path).toLowerCase();
  const mimeType = SUPPORTED_IMAGE_TYPES[ext];
  if (!mimeType) {
    throw new Error(`Unsupported image type "${ext || "(none)"}". Supported: ${Object.keys(SUPPORTED_IMAGE_TYPES).join(", ")}`);
  }
  const data = await readFile(path);
  return { data, mimeType };
}

/** Trim, capitalize the first letter and end with a period. "" stays "". */
export function postprocessCaption(raw: string): string {
  const text = raw.trim();
  if (!text) return "";
  const capitalized = text.charAt(0).toUpperCase() + text.slice(1);
  return capitalized.endsWith(".") ? capitalized : `${capitalized}.`;
}

const CaptionResponseSchema = z.object({ caption: z.string() });

/**
 * Captioning service over HTTP.
 * POSTs `{ image: <base64>, mimeType }` and expects `{ caption }` back.
 */
export class HttpCaptioner implements ImageCaptioner {
  readonly name = "http-captioner";

  constructor(
    private readonly endpoint: string,
    private readonly timeoutMs = 30_000,
  ) {}

  async caption(image: ImageInput): Promise<string> {
    const raw = await httpRequest({
      method: "POST",
      url: this.endpoint,
      body: { image: Buffer.from(image.data).toString("base64"), mimeType: image.mimeType },
      timeoutMs: this.timeoutMs,
      label: this.name,
    });
    const parsed = CaptionResponseSchema.safeParse(parseJson(raw, this.name));
    if (!parsed.success) {
      throw new Error(`${this.name}: response has no caption field`);
    }
    return parsed.data.caption;
  }
}

/**
 * Never-failing captioner. Wraps an optional inner captioner, cleans its
 * output, and substitutes a demo caption on error or empty output.
 */
export class SafeCaptioner implements ImageCaptioner {
  readonly name: string;

  constructor(
    private readonly inner: ImageCaptioner | null,
    private readonly random: () => number = Math.random,
  ) {
    this.name = inner ? `safe(${inner.name})` : "demo";
  }

  demoCaption(): string {
    const index = Math.min(Math.floor(this.random() * DEMO_CAPTIONS.length), DEMO_CAPTIONS.length - 1);
    return DEMO_CAPTIONS[index] ?? "No imaging finding available.";
  }

  async caption(image: ImageInput): Promise<string> {
    if (!this.inner) {
      log.debug("no captioning service configured, using demo caption");
      return this.demoCaption();
    }
    try {
      const text = postprocessCaption(await this.inner.caption(image));
      if (text) return text;
      log.warn(this.inner.name, "returned an empty caption, using demo caption");
    } catch (err) {
      log.warn(this.inner.name, "failed, using demo caption:", err instanceof Error ? err.message : String(err));
    }
    return this.demoCaption();
  }
}

export function createCaptioner(config: { endpoint?: string; timeoutMs: number }): SafeCaptioner {
  return new SafeCaptioner(config.endpoint ? new HttpCaptioner(config.endpoint, config.timeoutMs) : null);
}
