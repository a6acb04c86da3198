import type { Endpoint, EventSink, UploadPayload } from "../types.js";
import { recordEvent } from "../db/repositories/event-repository.js";
import { buildImagePayload, buildTextPayload, detectImageFormat } from "./payload.js";
import type { UploadDispatcher } from "./dispatcher.js";

export type AttachmentKind = "image" | "text" | "url";

/**
 * One shared item as handed over by the host. `load` materializes its
 * content: bytes for images, a string for text, a string or URL for links.
 */
export interface ShareAttachment {
  kind: string;
  load(): Promise<unknown>;
}

export interface ShareRequest {
  attachments: readonly ShareAttachment[];
  endpoint: Endpoint | null;
  tags?: string;
  extraNote?: string;
  context?: string;
}

export type ShareOutcome = "empty" | "success" | "failed";

export interface ShareResult {
  outcome: ShareOutcome;
  message: string;
  attempted: number;
  succeeded: number;
  failed: number;
}

export const SHARE_MESSAGES = {
  empty: "No shareable text or image found.",
  success: "Shared to Kash Stash!",
  failed: "Upload failed.",
  noEndpoint: "No endpoint configured. Please set up an endpoint first.",
} as const;

export const DEFAULT_SHARE_CONTEXT = "Shared from Kash Stash";

const RECOGNIZED_KINDS: ReadonlySet<string> = new Set<AttachmentKind>(["image", "text", "url"]);

type ItemResult = { attempted: false } | { attempted: true; success: boolean };

/** Appends the extra note to shared text, separated by a blank line. */
export function combineWithExtraNote(text: string, extraNote: string): string {
  const note = extraNote.trim();
  if (!note) return text;
  return `${text.trim()}\n\n${note}`;
}

export interface ShareFanOutOptions {
  fallbackContext?: string;
  events?: EventSink | null;
  now?: () => Date;
}

export class ShareFanOut {
  private fallbackContext: string;
  private events: EventSink | null;
  private now: () => Date;

  constructor(
    private dispatcher: UploadDispatcher,
    opts: ShareFanOutOptions = {},
  ) {
    this.fallbackContext = opts.fallbackContext ?? DEFAULT_SHARE_CONTEXT;
    this.events = opts.events ?? null;
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Load and upload every recognized attachment concurrently, wait for all
   * of them, then report once. One success is enough for overall success.
   */
  async share(request: ShareRequest): Promise<ShareResult> {
    const { endpoint } = request;
    if (!endpoint) {
      console.error("[share] No endpoint configured");
      return { outcome: "failed", message: SHARE_MESSAGES.noEndpoint, attempted: 0, succeeded: 0, failed: 0 };
    }

    const recognized = request.attachments.filter((attachment) => {
      if (RECOGNIZED_KINDS.has(attachment.kind)) return true;
      console.error(`[share] Ignoring attachment of kind '${attachment.kind}'`);
      return false;
    });

    const results = await Promise.all(recognized.map((attachment) => this.shareOne(attachment, request, endpoint)));

    let attempted = 0;
    let succeeded = 0;
    for (const result of results) {
      if (!result.attempted) continue;
      attempted += 1;
      if (result.success) succeeded += 1;
    }

    const outcome: ShareOutcome = attempted === 0 ? "empty" : succeeded > 0 ? "success" : "failed";
    const summary: ShareResult = {
      outcome,
      message: SHARE_MESSAGES[outcome],
      attempted,
      succeeded,
      failed: attempted - succeeded,
    };

    console.error(`[share] ${summary.message} (${succeeded}/${attempted} uploads succeeded)`);
    recordEvent(this.events, "SHARE_COMPLETED", {
      endpoint_id: endpoint.id,
      outcome,
      attempted,
      succeeded,
    });

    return summary;
  }

  private async shareOne(attachment: ShareAttachment, request: ShareRequest, endpoint: Endpoint): Promise<ItemResult> {
    let payload: UploadPayload | null;
    try {
      payload = this.buildPayload(attachment.kind, await attachment.load(), request, endpoint);
    } catch (err) {
      console.error(`[share] Error loading ${attachment.kind}:`, err instanceof Error ? err.message : String(err));
      return { attempted: false };
    }

    if (!payload) {
      console.error(`[share] No usable content in ${attachment.kind} attachment`);
      return { attempted: false };
    }

    const outcome = await this.dispatcher.upload(payload, endpoint);
    return { attempted: true, success: outcome.success };
  }

  private buildPayload(kind: string, content: unknown, request: ShareRequest, endpoint: Endpoint): UploadPayload | null {
    const tags = request.tags ?? "";
    const extraNote = request.extraNote ?? "";

    switch (kind) {
      case "image": {
        if (!(content instanceof Uint8Array) || content.length === 0) return null;
        const format = detectImageFormat(content);
        if (!format) return null;
        const context = request.context?.trim() || this.fallbackContext;
        return buildImagePayload({ bytes: content, format, tags, context, endpoint, now: this.now });
      }
      case "text": {
        if (typeof content !== "string" || content === "") return null;
        return buildTextPayload({ text: combineWithExtraNote(content, extraNote), tags, endpoint, now: this.now });
      }
      case "url": {
        const link = content instanceof URL ? content.href : typeof content === "string" ? content.trim() : "";
        if (!link || !URL.canParse(link)) return null;
        return buildTextPayload({ text: combineWithExtraNote(link, extraNote), tags, endpoint, now: this.now });
      }
      default:
        return null;
    }
  }
}
