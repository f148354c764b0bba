export type LogValue = unknown;
export type LogLevel = "debug" | "info" | "warn" | "error";

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let minimumLevel: LogLevel = "info";

export function configureLogging(input: { level: LogLevel }): void {
  minimumLevel = input.level;
}

function emit(level: LogLevel, event: string, fields: Record<string, LogValue>): void {
  if (levelRank[level] < levelRank[minimumLevel]) {
    return;
  }

  const payload = {
    level,
    event,
    timestamp: new Date().toISOString(),
    ...fields
  };

  const serialized = JSON.stringify(payload);

  if (level === "error" || level === "warn") {
    console.error(serialized);
    return;
  }

  console.log(serialized);
}

export function logDebug(event: string, fields: Record<string, LogValue> = {}): void {
  emit("debug", event, fields);
}

export function logInfo(event: string, fields: Record<string, LogValue> = {}): void {
  emit("info", event, fields);
}

export function logWarn(event: string, fields: Record<string, LogValue> = {}): void {
  emit("warn", event, fields);
}

export function logError(event: string, fields: Record<string, LogValue> = {}): void {
  emit("error", event, fields);
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}
