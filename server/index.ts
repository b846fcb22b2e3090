import { createServer } from "http";
import { loadConfig } from "./lib/config.js";
import { createRouter } from "./router.js";

const config = loadConfig();
const route = createRouter(config);

const server = createServer((req, res) => {
  const start = Date.now();
  res.on("finish", () => {
    const ms = Date.now() - start;
    console.log(`${req.method} ${req.url} → ${res.statusCode} (${ms}ms)`);
  });
  route(req, res);
});

server.listen(config.port, config.host, () => {
  console.log(`clean-path server listening on http://${config.host}:${config.port}`);
});
