import type { IncomingMessage, ServerResponse } from "http";

export const ALLOWED = "OPTIONS, GET, HEAD";

export async function handleOptions(
  _req: IncomingMessage,
  res: ServerResponse,
  _urlPath: string
): Promise<void> {
  res.writeHead(200, {
    Allow: ALLOWED,
    "Content-Length": "0",
  });
  res.end();
}
