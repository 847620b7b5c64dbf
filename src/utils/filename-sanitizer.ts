/**
 * Utility to sanitize filenames for cross-platform compatibility
 * Specifically targets Windows restrictions which are stricter than *nix
 *
 * @param name - Raw name, e.g. an episode title
 * @param fallback - Returned when nothing usable is left after sanitizing
 */
export function sanitizeFilename(name: string, fallback = 'untitled'): string {
  const sanitized = name
    // Replace Windows illegal characters: < > : " / \ | ? *
    .replace(/[<>:"/\\|?*]/g, '_')
    // Remove control characters (0-31 in ASCII)
    .replace(/[\x00-\x1F]/g, '')
    // Remove trailing spaces and dots (Windows doesn't like them)
    .replace(/[\s.]+$/, '');

  return sanitized.length > 0 ? sanitized : fallback;
}
