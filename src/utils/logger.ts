import fs from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";

export type LogLevel = "INFO" | "DEBUG" | "WARN" | "ERROR";

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

/**
 * Logging surface handed to every component. Implementations decide where the
 * entries go (a per-run file, the console, nowhere).
 */
export interface PilotLogger {
  debug(message: string, context?: unknown): void;
  info(message: string, context?: unknown): void;
  warn(message: string, context?: unknown): void;
  error(message: string, context?: unknown): void;
}

export function serializeLogEntry(entry: LogEntry) {
  return JSON.stringify(entry, (_key, value: unknown) => {
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }
    if (value instanceof Map) {
      return {
        dataType: "Map",
        value: Array.from(value.entries()),
      };
    }
    if (value instanceof Set) {
      return {
        dataType: "Set",
        value: Array.from(value.values()),
      };
    }
    if (value instanceof Uint8Array) {
      return { dataType: "Bytes", length: value.byteLength };
    }
    return value;
  });
}

type RunLoggerOptions = {
  mirror?: PilotLogger;
};

/** JSON-lines file logger, one file per task run. */
export class RunLogger implements PilotLogger {
  readonly runId: string;
  readonly filePath: string;
  private stream: fs.WriteStream;
  private mirror?: PilotLogger;

  constructor(filePath: string, runId: string, opts: RunLoggerOptions = {}) {
    this.filePath = filePath;
    this.runId = runId;
    this.mirror = opts.mirror;
    this.stream = fs.createWriteStream(this.filePath, { flags: "a" });
  }

  log(level: LogLevel, message: string, context?: unknown) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };
    if (!this.stream.closed) {
      this.stream.write(`${serializeLogEntry(entry)}\n`);
    }
    if (this.mirror) {
      forward(this.mirror, level, message, context);
    }
  }

  debug(message: string, context?: unknown) {
    this.log("DEBUG", message, context);
  }

  info(message: string, context?: unknown) {
    this.log("INFO", message, context);
  }

  warn(message: string, context?: unknown) {
    this.log("WARN", message, context);
  }

  error(message: string, context?: unknown) {
    this.log("ERROR", message, context);
  }

  close() {
    if (!this.stream.closed) {
      this.stream.end();
    }
  }
}

function forward(target: PilotLogger, level: LogLevel, message: string, context?: unknown) {
  switch (level) {
    case "DEBUG":
      target.debug(message, context);
      break;
    case "INFO":
      target.info(message, context);
      break;
    case "WARN":
      target.warn(message, context);
      break;
    case "ERROR":
      target.error(message, context);
      break;
  }
}

type InitOptions = {
  logDir?: string;
  runLabel?: string;
  mirror?: PilotLogger;
};

export function createRunLabel() {
  return `${new Date().toISOString().replace(/[:.]/g, "-")}-${randomUUID().slice(0, 8)}`;
}

export function initRunLogger({ logDir = "logs", runLabel, mirror }: InitOptions = {}) {
  const baseDir = path.resolve(process.cwd(), logDir);
  fs.mkdirSync(baseDir, { recursive: true });

  const runId = runLabel ?? createRunLabel();
  const filePath = path.join(baseDir, `pilot-run-${runId}.log`);

  const logger = new RunLogger(filePath, runId, { mirror });
  logger.info("Logger initialized", { filePath, runId });
  return logger;
}

export function createConsoleLogger(minLevel: LogLevel = "INFO"): PilotLogger {
  const write = (level: LogLevel, message: string, context?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const line = `[${level}] ${message}`;
    // eslint-disable-next-line no-console
    const sink = level === "ERROR" ? console.error : level === "WARN" ? console.warn : console.log;
    if (context === undefined) {
      sink(line);
    } else {
      sink(line, context);
    }
  };
  return {
    debug: (message, context) => write("DEBUG", message, context),
    info: (message, context) => write("INFO", message, context),
    warn: (message, context) => write("WARN", message, context),
    error: (message, context) => write("ERROR", message, context),
  };
}

export const consoleLogger = createConsoleLogger(
  process.env.PILOT_DEBUG === "true" ? "DEBUG" : "INFO"
);

export const silentLogger: PilotLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
