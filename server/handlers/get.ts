import type { IncomingMessage, ServerResponse } from "http";

/** Headers for the plain-text echo of `urlPath`. */
export function echoHeaders(urlPath: string): Record<string, string | number> {
  return {
    "Content-Type": "text/plain; charset=utf-8",
    "Content-Length": Buffer.byteLength(`${urlPath}\n`),
  };
}

/** Answer with the path the request was routed on. */
export async function handleGet(
  _req: IncomingMessage,
  res: ServerResponse,
  urlPath: string
): Promise<void> {
  res.writeHead(200, echoHeaders(urlPath));
  res.end(`${urlPath}\n`);
}
