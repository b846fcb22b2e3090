import type { IncomingMessage, ServerResponse } from "http";
import { parseRequestTarget } from "./lib/request-target.js";
import { cleanPathMiddleware } from "./middleware/clean-path.js";
import { handleOptions, ALLOWED } from "./handlers/options.js";
import { handleGet } from "./handlers/get.js";
import { handleHead } from "./handlers/head.js";
import type { ServerConfig } from "./lib/config.js";
import type { RouteHandler } from "./lib/types.js";

const handlers: Record<string, RouteHandler> = {
  OPTIONS: handleOptions,
  GET: handleGet,
  HEAD: handleHead,
};

function fail(res: ServerResponse, label: string, err: unknown): void {
  console.error(`[${label}] Error:`, err);
  if (!res.headersSent) {
    res.writeHead(500);
  }
  res.end("Internal Server Error");
}

export function createRouter(
  config: Pick<ServerConfig, "redirect" | "status">
): (req: IncomingMessage, res: ServerResponse) => void {
  const cleanPath = cleanPathMiddleware({
    enabled: config.redirect,
    status: config.status,
  });

  return (req, res) => {
    const method = (req.method ?? "GET").toUpperCase();
    const label = `${method} ${req.url ?? "/"}`;

    const dispatch = (): Promise<void> => {
      const handler = handlers[method];
      if (!handler) {
        res.writeHead(405, { Allow: ALLOWED });
        res.end();
        return Promise.resolve();
      }
      const { path } = parseRequestTarget(req.url ?? "/");
      return handler(req, res, path);
    };

    // Redirect errors (a Location node:http would refuse) surface here.
    Promise.resolve()
      .then(() => cleanPath(req, res, dispatch))
      .catch((err: unknown) => fail(res, label, err));
  };
}
