import { IncomingMessage, ServerResponse } from "http";
import { Socket } from "net";

/** A request/response pair over an unconnected socket. Nothing is sent. */
export function fakeExchange(
  url: string,
  method = "GET"
): { req: IncomingMessage; res: ServerResponse } {
  const req = new IncomingMessage(new Socket());
  req.url = url;
  req.method = method;
  const res = new ServerResponse(req);
  return { req, res };
}
