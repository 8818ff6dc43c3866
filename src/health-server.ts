/**
 * Minimal HTTP health server for liveness and readiness.
 * GET /health -> 200 if process is up.
 * GET /ready -> 200 only if getReady() returns true (orchestrator active and every component healthy), else 503.
 * GET /status -> component health and telemetry counters as JSON.
 */

import * as http from "http";
import { logger } from "./logging";

const DEFAULT_PORT = 8080;

export interface HealthServerOptions {
  port?: number;
  getReady?: () => boolean;
  getStatus?: () => Record<string, unknown>;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export function startHealthServer(options: HealthServerOptions = {}): http.Server {
  const port = options.port ?? (parseInt(process.env.HEALTH_PORT ?? String(DEFAULT_PORT), 10) || DEFAULT_PORT);
  const getReady = options.getReady ?? (() => false);
  const getStatus = options.getStatus ?? (() => ({}));

  const server = http.createServer((req, res) => {
    const url = (req.url ?? "").split("?")[0];
    if (req.method !== "GET") {
      res.writeHead(405);
      res.end();
      return;
    }
    if (url === "/health" || url === "/") {
      sendJson(res, 200, { ok: true });
      return;
    }
    if (url === "/ready") {
      const ready = getReady();
      sendJson(res, ready ? 200 : 503, { ok: ready, ready });
      return;
    }
    if (url === "/status") {
      sendJson(res, 200, getStatus());
      return;
    }
    res.writeHead(404);
    res.end();
  });

  server.listen(port, () => {
    const address = server.address();
    const bound = typeof address === "object" && address !== null ? address.port : port;
    logger.info({ event: "HEALTH_SERVER_STARTED", port: bound }, "Health server listening");
  });

  return server;
}
