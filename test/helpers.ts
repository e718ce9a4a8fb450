// test/helpers.ts

import { vi } from "vitest";
import { LogEntry, loggerConfig } from "../src";

/**
 * Polls `condition` until it holds on two consecutive checks.
 */
export async function waitUntil(
  condition: () => boolean,
  timeoutMs = 2000,
  pollMs = 5,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  let hits = 0;
  while (hits < 2) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, pollMs));
    hits = condition() ? hits + 1 : 0;
  }
}

export async function settle(nodes: Array<{ isIdle(): boolean }>): Promise<void> {
  await waitUntil(() => nodes.every((n) => n.isIdle()));
}

/**
 * Routes log entries into an array for the duration of a test file.
 */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  const originalHandler = loggerConfig.handler;
  const originalLevel = loggerConfig.level;

  beforeEach(() => {
    entries.length = 0;
    loggerConfig.configure({
      level: "debug",
      handler: vi.fn((entry: LogEntry) => {
        entries.push(entry);
      }),
    });
  });

  afterEach(() => {
    loggerConfig.configure({ level: originalLevel, handler: originalHandler });
  });

  return entries;
}
