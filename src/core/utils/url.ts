/**
 * URL manipulation utilities
 */

/**
 * Resolves an absolute URL or a root-relative path against an origin
 * @param origin - Origin to prefix root-relative paths with (e.g. "https://host")
 * @param loc - Absolute URL or path starting with "/"
 * @returns Resolved absolute URL or null if the reference has neither form
 */
export function resolveLocation(origin: string, loc: string): string | null {
  try {
    if (/^https?:/i.test(loc)) return new URL(loc).toString();
    if (loc.startsWith("//")) return null;
    if (loc.startsWith("/")) return new URL(loc, new URL(origin)).toString();
    return null;
  } catch {
    return null;
  }
}

/**
 * Joins an origin and path segments with single slashes
 */
export function joinUrl(origin: string, ...segments: string[]): string {
  const parts = segments
    .map((s) => s.replace(/^\/+|\/+$/g, ""))
    .filter(Boolean);
  return [origin.replace(/\/+$/, ""), ...parts].join("/");
}
