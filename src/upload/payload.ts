import type { Endpoint, UploadPayload } from "../types.js";
import { mergeTags } from "./tags.js";

export type ImageFormat = "png" | "jpeg";
export type ImageKind = "image" | "screenshot";

const IMAGE_TYPES: Record<ImageFormat, { extension: string; contentType: string }> = {
  png: { extension: "png", contentType: "image/png" },
  jpeg: { extension: "jpg", contentType: "image/jpeg" },
};

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

type Clock = () => Date;

/**
 * Filenames carry whole seconds only, so two uploads of the same kind in the
 * same second share a name.
 */
export function unixSeconds(now: Date): number {
  return Math.floor(now.getTime() / 1000);
}

export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  const startsWith = (signature: number[]): boolean =>
    bytes.length >= signature.length && signature.every((b, i) => bytes[i] === b);

  if (startsWith(PNG_SIGNATURE)) return "png";
  if (startsWith(JPEG_SIGNATURE)) return "jpeg";
  return null;
}

export function buildTextPayload(opts: {
  text: string;
  tags: string;
  endpoint: Endpoint;
  now?: Clock;
}): UploadPayload {
  const now = opts.now ?? (() => new Date());
  return {
    file: {
      content: Buffer.from(opts.text, "utf-8").toString("base64"),
      filename: `note_${unixSeconds(now())}.txt`,
      content_type: "text/plain",
    },
    tags: mergeTags(opts.tags, opts.endpoint.device),
    device: opts.endpoint.device,
  };
}

export function buildImagePayload(opts: {
  bytes: Uint8Array;
  format: ImageFormat;
  kind?: ImageKind;
  tags: string;
  context: string;
  endpoint: Endpoint;
  now?: Clock;
}): UploadPayload {
  const now = opts.now ?? (() => new Date());
  const { extension, contentType } = IMAGE_TYPES[opts.format];
  const prefix = opts.kind ?? "image";

  return {
    file: {
      content: Buffer.from(opts.bytes).toString("base64"),
      filename: `${prefix}_${unixSeconds(now())}.${extension}`,
      content_type: contentType,
    },
    tags: mergeTags(opts.tags, opts.endpoint.device),
    device: opts.endpoint.device,
    context_prompt: opts.context.trim(),
  };
}

/** An arbitrary file whose name and MIME type the caller already knows. */
export function buildFilePayload(opts: {
  bytes: Uint8Array;
  filename: string;
  contentType: string;
  tags: string;
  context?: string;
  endpoint: Endpoint;
}): UploadPayload {
  const payload: UploadPayload = {
    file: {
      content: Buffer.from(opts.bytes).toString("base64"),
      filename: opts.filename,
      content_type: opts.contentType,
    },
    tags: mergeTags(opts.tags, opts.endpoint.device),
    device: opts.endpoint.device,
  };

  const context = opts.context?.trim();
  if (context) payload.context_prompt = context;

  return payload;
}

const CONTENT_TYPES: Record<string, string> = {
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".csv": "text/csv",
  ".json": "application/json",
  ".pdf": "application/pdf",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".html": "text/html",
};

export function contentTypeForFilename(filename: string): string {
  const dot = filename.lastIndexOf(".");
  const extension = dot === -1 ? "" : filename.slice(dot).toLowerCase();
  return CONTENT_TYPES[extension] ?? "application/octet-stream";
}
