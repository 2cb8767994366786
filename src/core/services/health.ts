/**
 * Health check server (/healthz)
 */

import http from "http";
import { toError } from "../utils/errors";
import { Logger } from "../utils/logger";

/**
 * Starts the health endpoint; listen errors (e.g. port in use) are logged
 * and leave price tracking running
 * @param port - Port to listen on
 * @param isRunning - Reports whether the poll loop is still running
 */
export function startHealthServer(
  port: number,
  isRunning: () => boolean,
): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === "/healthz") {
      const ok = isRunning();
      res.writeHead(ok ? 200 : 503, { "Content-Type": "text/plain" });
      res.end(ok ? "ok" : "stopped");
    } else {
      res.writeHead(404);
      res.end();
    }
  });
  server.on("error", (e) => {
    Logger.error("Health check server failed", toError(e), { port });
  });
  server.listen(port, () => {
    Logger.info("Health check endpoint listening on /healthz", { port });
  });
  return server;
}
