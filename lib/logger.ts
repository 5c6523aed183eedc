type Level = "debug" | "info" | "warn" | "error";

const ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const threshold = (): number => {
  const v = process.env.LOG_LEVEL;
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? ORDER[v] : ORDER.info;
};

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

/** Console logger with a `[context]` prefix. LOG_LEVEL filters output. */
export function createLogger(context: string): Logger {
  const emit = (level: Level, message: string, meta?: Record<string, unknown>) => {
    if (ORDER[level] < threshold()) return;
    const line = `[${context}] ${message}`;
    const sink = level === "error" ? console.error : level === "warn" ? console.warn : level === "info" ? console.info : console.debug;
    if (meta) sink(line, meta);
    else sink(line);
  };
  return {
    debug: (m, meta) => emit("debug", m, meta),
    info: (m, meta) => emit("info", m, meta),
    warn: (m, meta) => emit("warn", m, meta),
    error: (m, meta) => emit("error", m, meta)
  };
}

export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) return { name: error.name, message: error.message };
  return { error: String(error) };
}
