/**
 * Make a collection name safe to use as a file name on every platform.
 */
export function sanitizeFilename(name: string, maxLength = 200): string {
  return name
    .replace(/[/\\:*?"<>|]/g, "-")
    .replace(/[\u0000-\u001f]/g, "")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[. ]+$/, "")
    .slice(0, maxLength);
}
