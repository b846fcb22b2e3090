/** A raw HTTP request-target split into its parts. */
export interface RequestTarget {
  /** "scheme://authority" for absolute-form targets, "" otherwise. */
  origin: string;
  path: string;
  /** null when there is no "?", "" for a bare "?". */
  query: string | null;
  fragment: string | null;
}

const ORIGIN_RE = /^[a-zA-Z][a-zA-Z\d+.-]*:\/\/[^/?#]*/;

/**
 * Split a request-target by plain string search.
 * E.g. "///?a=1"                → { origin: "", path: "///", query: "a=1" }
 *      "http://h.test/a//b?x#y" → { origin: "http://h.test", path: "/a//b", query: "x", fragment: "y" }
 *
 * `URL` is not used here: it resolves dot segments on its own.
 */
export function parseRequestTarget(raw: string): RequestTarget {
  const match = ORIGIN_RE.exec(raw);
  const origin = match ? match[0] : "";
  let rest = raw.slice(origin.length);

  let fragment: string | null = null;
  const hashIdx = rest.indexOf("#");
  if (hashIdx !== -1) {
    fragment = rest.slice(hashIdx + 1);
    rest = rest.slice(0, hashIdx);
  }

  let query: string | null = null;
  const queryIdx = rest.indexOf("?");
  if (queryIdx !== -1) {
    query = rest.slice(queryIdx + 1);
    rest = rest.slice(0, queryIdx);
  }

  return { origin, path: rest, query, fragment };
}

export function formatRequestTarget(target: RequestTarget): string {
  let out = target.origin + target.path;
  if (target.query !== null) out += "?" + target.query;
  if (target.fragment !== null) out += "#" + target.fragment;
  return out;
}

/**
 * Whether the target carries a path at all. Asterisk-form ("*") and an
 * absolute-form target with nothing after the authority have none.
 */
export function hasPath(target: RequestTarget): boolean {
  return target.path.startsWith("/");
}
