import { mkdir, writeFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type { Endpoint } from "../types.js";

/**
 * Keep a local copy of a screenshot when the endpoint asks for it.
 * Returns the written path, or null when nothing was written.
 */
export async function keepScreenshot(
  endpoint: Pick<Endpoint, "keepScreenshots" | "screenshotFolder">,
  filename: string,
  bytes: Uint8Array,
): Promise<string | null> {
  const folder = endpoint.screenshotFolder.trim();
  if (!endpoint.keepScreenshots || !folder) return null;

  const target = join(resolve(folder), basename(filename));
  try {
    await mkdir(resolve(folder), { recursive: true });
    await writeFile(target, bytes);
    return target;
  } catch (err) {
    console.error(`[upload] Could not keep screenshot in ${folder}:`, err instanceof Error ? err.message : String(err));
    return null;
  }
}
