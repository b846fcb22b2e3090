import type { IncomingMessage, ServerResponse } from "http";

/** Hands the request on to the next stage of the pipeline. */
export type Next = () => void | Promise<void>;

/** A connect-style middleware. */
export type Middleware = (
  req: IncomingMessage,
  res: ServerResponse,
  next: Next
) => void | Promise<void>;

/** A request handler, called with the path the router dispatched on. */
export type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  urlPath: string
) => Promise<void>;

export type RedirectStatus = 301 | 308;
