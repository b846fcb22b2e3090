import { PERMANENT_REDIRECT, resolveRedirect } from "../lib/redirect.js";
import type { Middleware, RedirectStatus } from "../lib/types.js";

export interface CleanPathOptions {
  /** Pass every request straight through when false. Defaults to true. */
  enabled?: boolean;
  status?: RedirectStatus;
}

/**
 * Middleware that redirects to the canonical form of the request path.
 *
 * - Merges repeated "/" into one.
 * - Resolves and drops "." and ".." segments.
 * - Adds a trailing "/" when the last segment has no file extension.
 *
 * Clean requests go to `next` untouched; anything else gets a permanent
 * redirect with the original query string reattached.
 */
export function cleanPathMiddleware(options: CleanPathOptions = {}): Middleware {
  const enabled = options.enabled ?? true;
  const status = options.status ?? PERMANENT_REDIRECT;

  return (req, res, next) => {
    if (!enabled) return next();

    const location = resolveRedirect(req.url ?? "/");
    if (location === null) return next();

    res.statusCode = status;
    res.setHeader("Location", location);
    res.setHeader("Content-Length", "0");
    res.end();
  };
}
