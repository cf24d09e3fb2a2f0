import { randomUUID } from "node:crypto";

import type { Meta } from "./envelope.js";
import { createLogger, type Logger } from "./logger.js";

interface WritableLike {
  write(chunk: string): unknown;
}

export interface CreateCommandContextOptions {
  command?: string;
  clock?: () => number;
  now?: () => Date;
  requestIdFactory?: () => string;
  verbose?: boolean;
  logStream?: WritableLike;
}

export interface CommandContext {
  command: string;
  requestId: string;
  startedAt: string;
  verbose: boolean;
  logger: Logger;
  toMeta: () => Meta;
}

export function createCommandContext(options: CreateCommandContextOptions = {}): CommandContext {
  const clock = options.clock ?? Date.now;
  const now = options.now ?? (() => new Date());
  const requestIdFactory = options.requestIdFactory ?? randomUUID;
  const verbose = options.verbose ?? false;
  const command = options.command ?? "help";

  const startTimeMs = clock();
  const startedAt = now().toISOString();
  const requestId = requestIdFactory();
  const logger = createLogger({ verbose, stream: options.logStream ?? process.stderr });

  return {
    command,
    requestId,
    startedAt,
    verbose,
    logger,
    toMeta: () => {
      const endTimeMs = clock();
      const durationMs = Math.max(0, endTimeMs - startTimeMs);
      return {
        command,
        requestId,
        startedAt,
        finishedAt: now().toISOString(),
        durationMs,
        verbose,
      };
    },
  };
}
