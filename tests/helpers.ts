import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { vi } from "vitest";

import type { Logger } from "../src/logger.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export function loadFixture(name: string): string {
  return readFileSync(join(__dirname, "fixtures", name), "utf8");
}

export function createTestLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  } satisfies Logger;
}
