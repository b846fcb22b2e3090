import { canonicalizePath } from "./clean-path.js";
import {
  formatRequestTarget,
  hasPath,
  parseRequestTarget,
} from "./request-target.js";

export const PERMANENT_REDIRECT = 308;

// Same test node:http applies to header values.
const INVALID_HEADER_CHAR = /[^\t\x20-\x7e\x80-\xff]/;

export class InvalidRedirectTargetError extends Error {
  readonly target: string;

  constructor(target: string) {
    super(`Cannot redirect to ${JSON.stringify(target)}: invalid Location`);
    this.name = "InvalidRedirectTargetError";
    this.target = target;
  }
}

export function assertValidLocation(target: string): void {
  if (INVALID_HEADER_CHAR.test(target)) {
    throw new InvalidRedirectTargetError(target);
  }
}

/**
 * Decide whether a request-target needs a redirect.
 * Returns null to pass the request through, or the target with only its path
 * replaced by the canonical one (query, origin and fragment kept verbatim).
 */
export function resolveRedirect(rawUrl: string): string | null {
  const target = parseRequestTarget(rawUrl);
  if (!hasPath(target)) return null;

  const result = canonicalizePath(target.path);
  if (result.kind === "unchanged") return null;

  const location = formatRequestTarget({ ...target, path: result.path });
  assertValidLocation(location);
  return location;
}
