import type { IncomingMessage, ServerResponse } from "http";
import { echoHeaders } from "./get.js";

export async function handleHead(
  _req: IncomingMessage,
  res: ServerResponse,
  urlPath: string
): Promise<void> {
  res.writeHead(200, echoHeaders(urlPath));
  res.end();
}
