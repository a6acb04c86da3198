import { z } from "zod";
import { basename } from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { InvalidParameterError, UnsupportedImageError } from "../errors.js";
import {
  buildFilePayload,
  buildImagePayload,
  buildTextPayload,
  contentTypeForFilename,
  detectImageFormat,
  unixSeconds,
} from "../upload/payload.js";
import { keepScreenshot } from "../upload/screenshots.js";
import type { ToolContext } from "./shared.js";
import { jsonResult, readInputFile, requireEndpoint, toolError } from "./shared.js";

const endpointIdParam = z
  .string()
  .optional()
  .describe("Upload to this endpoint instead of the current one.");

const tagsParam = z.string().optional().describe("Comma-separated tags. The endpoint's device tag is added automatically.");

export function registerUploadTools(server: McpServer, ctx: ToolContext): void {
  const now = ctx.now ?? (() => new Date());

  server.registerTool(
    "upload_note",
    {
      description: "Upload a text note (sent as note_<timestamp>.txt, text/plain) to the current endpoint.",
      inputSchema: {
        text: z.string().describe("Note text."),
        tags: tagsParam,
        endpoint_id: endpointIdParam,
      },
    },
    async ({ text, tags, endpoint_id }) => {
      try {
        if (text.trim() === "") throw new InvalidParameterError("Note text is empty.");
        const endpoint = requireEndpoint(ctx, endpoint_id);

        const payload = buildTextPayload({ text, tags: tags ?? "", endpoint, now });
        const outcome = await ctx.dispatcher.upload(payload, endpoint);

        return jsonResult(
          {
            ...outcome,
            endpoint: endpoint.name,
            filename: payload.file.filename,
            tags: payload.tags,
          },
          !outcome.success,
        );
      } catch (err) {
        return toolError(err);
      }
    },
  );

  server.registerTool(
    "upload_image",
    {
      description:
        "Upload a PNG or JPEG image with an optional context prompt. Provide either file_path or content_base64. " +
        "kind 'screenshot' names the file screenshot_<timestamp> and keeps a local copy when the endpoint is set to.",
      inputSchema: {
        file_path: z.string().optional().describe("Image file to upload."),
        content_base64: z.string().optional().describe("Base64-encoded image bytes."),
        context: z.string().optional().describe("Context prompt describing the image."),
        kind: z.enum(["image", "screenshot"]).optional().describe("Filename prefix (default image)."),
        tags: tagsParam,
        endpoint_id: endpointIdParam,
      },
    },
    async ({ file_path, content_base64, context, kind, tags, endpoint_id }) => {
      try {
        if ((file_path === undefined) === (content_base64 === undefined)) {
          throw new InvalidParameterError("Provide exactly one of file_path or content_base64.");
        }

        let bytes: Uint8Array;
        let source: string;
        if (file_path !== undefined) {
          bytes = (await readInputFile(file_path)).bytes;
          source = file_path;
        } else {
          bytes = Buffer.from(content_base64 ?? "", "base64");
          source = "content_base64";
          if (bytes.length === 0) throw new InvalidParameterError("Image data is empty.");
        }

        const format = detectImageFormat(bytes);
        if (!format) throw new UnsupportedImageError(source);

        const endpoint = requireEndpoint(ctx, endpoint_id);
        const payload = buildImagePayload({
          bytes,
          format,
          kind: kind ?? "image",
          tags: tags ?? "",
          context: context ?? "",
          endpoint,
          now,
        });

        const keptAt = kind === "screenshot" ? await keepScreenshot(endpoint, payload.file.filename, bytes) : null;
        const outcome = await ctx.dispatcher.upload(payload, endpoint);

        return jsonResult(
          {
            ...outcome,
            endpoint: endpoint.name,
            filename: payload.file.filename,
            content_type: payload.file.content_type,
            tags: payload.tags,
            kept_at: keptAt,
          },
          !outcome.success,
        );
      } catch (err) {
        return toolError(err);
      }
    },
  );

  server.registerTool(
    "upload_file",
    {
      description:
        "Upload any file from disk. The uploaded name is file_<timestamp>_<original name>; " +
        "the content type is inferred from the extension unless given.",
      inputSchema: {
        file_path: z.string().min(1).describe("Path to the file (relative or absolute)."),
        content_type: z.string().optional().describe("MIME type override."),
        context: z.string().optional().describe("Optional context prompt."),
        tags: tagsParam,
        endpoint_id: endpointIdParam,
      },
    },
    async ({ file_path, content_type, context, tags, endpoint_id }) => {
      try {
        const { absolutePath, bytes } = await readInputFile(file_path);
        const endpoint = requireEndpoint(ctx, endpoint_id);

        const originalName = basename(absolutePath);
        const payload = buildFilePayload({
          bytes,
          filename: `file_${unixSeconds(now())}_${originalName}`,
          contentType: content_type ?? contentTypeForFilename(originalName),
          tags: tags ?? "",
          context,
          endpoint,
        });
        const outcome = await ctx.dispatcher.upload(payload, endpoint);

        return jsonResult(
          {
            ...outcome,
            endpoint: endpoint.name,
            file_path: absolutePath,
            filename: payload.file.filename,
            content_type: payload.file.content_type,
            tags: payload.tags,
          },
          !outcome.success,
        );
      } catch (err) {
        return toolError(err);
      }
    },
  );
}
