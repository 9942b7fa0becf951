import {
  DEFAULT_BASE_URL,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_PORT,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_TIMEZONE,
  DEFAULT_USER_AGENT,
} from "./constants.js";
import { isLogLevel } from "./logger.js";
import type { Env, Settings } from "./types.js";

function readPositiveInt(env: Env, key: keyof Env, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Configuration error: ${key} must be a positive integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value <= 0) {
    throw new Error(`Configuration error: ${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readBaseUrl(env: Env): string {
  const raw = env.SOURCE_BASE_URL?.trim();
  if (!raw) {
    return DEFAULT_BASE_URL;
  }
  if (!URL.canParse(raw)) {
    throw new Error(`Configuration error: SOURCE_BASE_URL is not a valid URL: "${raw}"`);
  }
  return raw.replace(/\/+$/, "");
}

export function resolveSettings(env: Env): Settings {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`Configuration error: LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  return {
    baseUrl: readBaseUrl(env),
    userAgent: env.USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    requestTimeoutMs: readPositiveInt(env, "REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS),
    cacheTtlMs: readPositiveInt(env, "CACHE_TTL_SECONDS", DEFAULT_CACHE_TTL_SECONDS) * 1000,
    timezone: env.TIMEZONE?.trim() || DEFAULT_TIMEZONE,
    port: readPositiveInt(env, "PORT", DEFAULT_PORT),
    logLevel,
  };
}
