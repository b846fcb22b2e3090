export type CanonicalizationResult =
  | { kind: "unchanged" }
  | { kind: "changed"; path: string };

/** True if the text after the last "." is non-empty and holds no "/". */
export function hasExtension(path: string): boolean {
  const idx = path.lastIndexOf(".");
  if (idx === -1) return false;
  const suffix = path.slice(idx + 1);
  return suffix.length > 0 && !suffix.includes("/");
}

/** True if `path` has a "." or ".." segment. Assumes a leading "/". */
function hasDotSegment(path: string): boolean {
  let idx = path.indexOf("/.");
  while (idx !== -1) {
    let end = idx + 2;
    if (path[end] === ".") end++;
    if (end === path.length || path[end] === "/") return true;
    idx = path.indexOf("/.", idx + 1);
  }
  return false;
}

/**
 * Cheap check for an already canonical path. Only substring searches, no
 * segment list, so clean requests skip `cleanPath` entirely.
 *
 * Agrees with `cleanPath(path) === path` for every input.
 */
export function isCleanPath(path: string): boolean {
  return (
    path.startsWith("/") &&
    !path.includes("//") &&
    !hasDotSegment(path) &&
    hasExtension(path) !== path.endsWith("/")
  );
}

/**
 * Canonicalize a URL path.
 * E.g. "//a//b//../" → "/a/"
 *      "/..//.."     → "/"
 *      "//m.js"      → "/m.js"
 *      "/m."         → "/m./"
 *
 * Repeated "/" are merged, "." is dropped, ".." pops the previous segment and
 * is absorbed at the root. Non-root results end in "/" unless the last
 * segment has an extension and the raw path had no trailing "/".
 */
export function cleanPath(raw: string): string {
  const segments: string[] = [];
  for (const segment of raw.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  let path = "/" + segments.join("/");
  if (path === "/") return path;

  if (raw.endsWith("/") || !hasExtension(path)) {
    path += "/";
  }
  return path;
}

/** Fast check first, full rebuild only when it fails. */
export function canonicalizePath(raw: string): CanonicalizationResult {
  if (isCleanPath(raw)) return { kind: "unchanged" };
  const path = cleanPath(raw);
  return path === raw ? { kind: "unchanged" } : { kind: "changed", path };
}
