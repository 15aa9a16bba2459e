import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { MonitorMetrics } from "../metrics/exporter.js";
import { errorMessage } from "../errors.js";
import { getHealthStatus, type DaemonState } from "./health.js";

export type DaemonStateProvider = () => DaemonState;

/**
 * Create and start an HTTP server with health and metrics endpoints.
 *
 *   GET /health   JSON status, 503 when the monitor is stale
 *   GET /metrics  Prometheus exposition (when metrics are given)
 *
 * A listen failure (port in use, bad bind address) is logged and the
 * daemon keeps running without the endpoints.
 */
export function createHealthServer(
  getState: DaemonStateProvider,
  metrics: MonitorMetrics | undefined,
  port = 18090,
  bind = "127.0.0.1",
): Server {
  const server = createServer(async (req: IncomingMessage, res: ServerResponse) => {
    if (req.method === "GET" && req.url === "/health") {
      try {
        const health = getHealthStatus(getState());
        res.writeHead(health.status === "healthy" ? 200 : 503, { "Content-Type": "application/json" });
        res.end(JSON.stringify(health));
      } catch (err) {
        res.writeHead(503, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ status: "unhealthy", error: errorMessage(err) }));
      }
    } else if (req.method === "GET" && req.url === "/metrics" && metrics) {
      try {
        const body = await metrics.getMetrics();
        res.writeHead(200, { "Content-Type": metrics.registry.contentType });
        res.end(body);
      } catch (err) {
        res.writeHead(500);
        res.end(`Error: ${errorMessage(err)}\n`);
      }
    } else {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not Found");
    }
  });

  server.on("error", (err) => {
    console.error(`[linewatch] Health server unavailable on ${bind}:${port}: ${errorMessage(err)}`);
  });
  server.listen(port, bind);
  return server;
}
