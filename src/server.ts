import "dotenv/config";
import express from "express";
import type { Request as ExpressRequest, Response as ExpressResponse } from "express";

import { resolveSettings } from "./config.js";
import { createApp, type App } from "./index.js";
import { createLogger } from "./logger.js";

async function forward(app: App, req: ExpressRequest, res: ExpressResponse): Promise<void> {
  const url = new URL(req.originalUrl, `${req.protocol}://${req.get("host") ?? "localhost"}`);
  const response = await app.fetch(new Request(url, { method: req.method }));
  res.status(response.status);
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  res.send(Buffer.from(await response.arrayBuffer()));
}

const settings = resolveSettings(process.env);
const logger = createLogger(settings.logLevel);
const app = createApp(settings, { logger });

const server = express();
server.disable("x-powered-by");

server.use((req, res, next) => {
  const startedAt = Date.now();
  res.on("finish", () => {
    logger.debug("HTTP response", {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      elapsedMs: Date.now() - startedAt,
    });
  });
  forward(app, req, res).catch(next);
});

server.listen(settings.port, () => {
  logger.info("Greek Nameday API listening", { port: settings.port, source: settings.baseUrl });
});
