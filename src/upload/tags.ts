/**
 * Combine comma-separated user tags with the endpoint's device tag.
 *
 * Each tag appears once, compared case-insensitively; the first spelling
 * wins and order of first appearance is kept. The device tag goes last
 * unless the user already gave it.
 */
export function mergeTags(userTags: string, deviceTag: string): string {
  const seen = new Set<string>();
  const merged: string[] = [];

  const add = (tag: string): void => {
    const key = tag.toLowerCase();
    if (seen.has(key)) return;
    seen.add(key);
    merged.push(tag);
  };

  for (const piece of userTags.split(",")) {
    const tag = piece.trim();
    if (tag) add(tag);
  }

  const device = deviceTag.trim();
  if (device) add(device);

  return merged.join(",");
}
