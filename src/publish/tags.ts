/**
 * Pulls hashtags out of caption text. Punctuation inside a tag is dropped,
 * duplicates are compared case-insensitively (first spelling wins) and the
 * original order is kept.
 */
export function extractHashtags(caption: string | undefined, maxTags: number): string[] {
  if (!caption || maxTags <= 0) return [];

  const tags: string[] = [];
  const seen = new Set<string>();
  for (const match of caption.matchAll(/#([^\s#]+)/g)) {
    const tag = match[1].replace(/[^\p{L}\p{M}\p{N}_]/gu, "");
    if (!tag) continue;
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    tags.push(tag);
    if (tags.length >= maxTags) break;
  }
  return tags;
}
