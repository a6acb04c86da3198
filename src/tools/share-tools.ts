import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ShareAttachment } from "../upload/share.js";
import type { ToolContext } from "./shared.js";
import { jsonResult, readInputFile } from "./shared.js";

const shareItemSchema = z.object({
  type: z.string().describe("image, text or url. Other types are ignored."),
  text: z.string().optional().describe("Text content (type text)."),
  url: z.string().optional().describe("Link (type url)."),
  file_path: z.string().optional().describe("File to read: image bytes, or UTF-8 text for type text."),
  content_base64: z.string().optional().describe("Base64 image bytes (type image)."),
});

export type ShareItem = z.infer<typeof shareItemSchema>;

/** Turn a tool item into an attachment whose content is read lazily. */
export function attachmentFromItem(item: ShareItem): ShareAttachment {
  return {
    kind: item.type,
    async load(): Promise<unknown> {
      switch (item.type) {
        case "image":
          if (item.file_path !== undefined) return (await readInputFile(item.file_path)).bytes;
          if (item.content_base64 !== undefined) return Buffer.from(item.content_base64, "base64");
          throw new Error("image item has neither file_path nor content_base64");
        case "text":
          if (item.text !== undefined) return item.text;
          if (item.file_path !== undefined) return (await readInputFile(item.file_path)).bytes.toString("utf-8");
          throw new Error("text item has neither text nor file_path");
        case "url":
          if (item.url !== undefined) return item.url;
          throw new Error("url item has no url");
        default:
          return null;
      }
    },
  };
}

export function registerShareTools(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "share_items",
    {
      description:
        "Share several items at once. Every image, text and url item is uploaded concurrently to the current endpoint; " +
        "the call reports success if at least one upload got through. Items that cannot be loaded are skipped.",
      inputSchema: {
        items: z.array(shareItemSchema).describe("Shared items."),
        tags: z.string().optional().describe("Comma-separated tags for every item."),
        extra_note: z.string().optional().describe("Appended to shared text and links after a blank line."),
        context: z.string().optional().describe("Context prompt for shared images."),
      },
    },
    async ({ items, tags, extra_note, context }) => {
      const endpoint = ctx.registry.resolveCurrent();

      const result = await ctx.share.share({
        attachments: items.map(attachmentFromItem),
        endpoint,
        tags,
        extraNote: extra_note,
        context,
      });

      return jsonResult(
        {
          ...result,
          endpoint: endpoint?.name ?? null,
        },
        result.outcome !== "success",
      );
    },
  );
}
