// HTTP health check and metrics endpoints.

import { createServer, type Server, type ServerResponse } from "node:http";

export interface HealthSource {
  trackedChannelCount(): Promise<number>;
  activeSectionCount(): number;
  startedAt: number;
}

export const createHealthServer = (source: HealthSource): Server => {
  const sendJson = (res: ServerResponse, status: number, payload: unknown): void => {
    const body = JSON.stringify(payload);
    res.writeHead(status, { "Content-Type": "application/json", "Content-Length": Buffer.byteLength(body) });
    res.end(body);
  };

  return createServer((req, res) => {
    if (req.method !== "GET" || (req.url !== "/health" && req.url !== "/metrics")) {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not Found");
      return;
    }

    const route = req.url;
    source.trackedChannelCount().then(
      (channels) => {
        if (route === "/health") {
          sendJson(res, 200, { status: "ok", channels });
          return;
        }

        sendJson(res, 200, {
          trackedChannels: channels,
          activeSections: source.activeSectionCount(),
          uptime: Math.floor((Date.now() - source.startedAt) / 1_000)
        });
      },
      (error: unknown) => {
        sendJson(res, 503, { status: "degraded", message: error instanceof Error ? error.message : String(error) });
      }
    );
  });
};
