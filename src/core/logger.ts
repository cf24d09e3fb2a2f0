interface WritableLike {
  write(chunk: string): unknown;
}

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
}

export interface CreateLoggerOptions {
  verbose: boolean;
  stream: WritableLike;
}

export const silentLogger: Logger = {
  debug: () => undefined,
};

export function createLogger(options: CreateLoggerOptions): Logger {
  if (!options.verbose) {
    return silentLogger;
  }

  return {
    debug: (message, fields) => {
      options.stream.write(`[debug] ${message}${formatFields(fields)}\n`);
    },
  };
}

function formatFields(fields: LogFields | undefined): string {
  if (fields === undefined) {
    return "";
  }

  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);

  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

function formatValue(value: string | number | boolean | null | undefined): string {
  if (typeof value === "string") {
    return /\s/u.test(value) ? JSON.stringify(value) : value;
  }

  return String(value);
}
