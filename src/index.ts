import { NamedayError } from "./errors.js";
import { createExtractionCaches, type ExtractionCaches } from "./extract.js";
import { createFetcher, type DocumentFetcher } from "./fetcher.js";
import { createLogger, type Logger } from "./logger.js";
import { handleHealthCheck, handleRoot } from "./routes/health/index.js";
import {
  handleMonthRequest,
  handleSearchRequest,
  handleTodayRequest,
  handleTomorrowRequest,
  type RouteContext,
} from "./routes/nameday/index.js";
import { RequestError } from "./routes/nameday/request.js";
import type { Settings } from "./types.js";

export interface AppOverrides {
  logger?: Logger;
  fetchDocument?: DocumentFetcher;
  caches?: ExtractionCaches;
  now?: () => Date;
}

export interface App {
  fetch(request: Request): Promise<Response>;
}

function notFound(): Response {
  return new Response("Not found", { status: 404 });
}

function methodNotAllowed(): Response {
  return new Response("Method not allowed", { status: 405 });
}

function errorResponse(message: string, status: number): Response {
  return Response.json({ error: message }, { status });
}

async function route(segments: string[], context: RouteContext): Promise<Response> {
  const [resource, param, ...rest] = segments;
  if (rest.length > 0) {
    return notFound();
  }

  switch (resource) {
    case "":
      return param === undefined ? handleRoot() : notFound();
    case "healthz":
      return param === undefined ? handleHealthCheck() : notFound();
    case "today":
      return param === undefined ? handleTodayRequest(context) : notFound();
    case "tomorrow":
      return param === undefined ? handleTomorrowRequest(context) : notFound();
    case "month":
      return handleMonthRequest(param, context);
    case "search":
      return param === undefined ? notFound() : handleSearchRequest(param, context);
    default:
      return notFound();
  }
}

export function createApp(settings: Settings, overrides: AppOverrides = {}): App {
  const logger = overrides.logger ?? createLogger(settings.logLevel);
  const context: RouteContext = {
    baseUrl: settings.baseUrl,
    timezone: settings.timezone,
    logger,
    fetchDocument:
      overrides.fetchDocument ??
      createFetcher({ userAgent: settings.userAgent, timeoutMs: settings.requestTimeoutMs, logger }),
    caches: overrides.caches ?? createExtractionCaches(settings.cacheTtlMs),
    now: overrides.now,
  };

  return {
    async fetch(request: Request): Promise<Response> {
      if (request.method !== "GET") {
        return methodNotAllowed();
      }

      const url = new URL(request.url);
      try {
        return await route(url.pathname.split("/").slice(1), context);
      } catch (error) {
        if (error instanceof RequestError || error instanceof NamedayError) {
          return errorResponse(error.message, error.status);
        }
        logger.error("Failed to process request", { path: url.pathname, error });
        return errorResponse("Internal server error", 500);
      }
    },
  };
}
