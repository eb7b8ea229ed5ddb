import { createWriteStream, type WriteStream } from "node:fs";
import { once } from "node:events";
import bunyan from "bunyan";
import { type ConfigData, LOG_LEVELS } from "./config/index.js";

function toLevel(value: string): bunyan.LogLevelString {
  const level = LOG_LEVELS.find((l) => l === value);
  return level ?? "warn";
}

function createLogger(level: bunyan.LogLevelString, out: NodeJS.WritableStream): bunyan {
  return bunyan.createLogger({ name: "sudokit", streams: [{ level, stream: out }] });
}

// The board owns stdout, so records never go there
let logLevel = toLevel(process.env.LOG_LEVEL ?? "warn");
let log = createLogger(logLevel, process.stderr);
let logFile = "";
let fileStream: WriteStream | null = null;
const closing: Promise<unknown>[] = [];

function endFileStream(): void {
  if (!fileStream) return;
  closing.push(once(fileStream, "close"));
  fileStream.end();
  fileStream = null;
}

/**
 * Apply resolved configuration. The level changes in place; a new
 * logger is built only when the destination changes, and the file it
 * wrote to before is closed.
 */
export function configureLogger(config: Pick<ConfigData, "logLevel" | "logFile">): bunyan {
  const level = toLevel(config.logLevel);
  logLevel = level;
  if (config.logFile === logFile) {
    log.level(level);
    return log;
  }

  endFileStream();
  if (config.logFile) {
    fileStream = createWriteStream(config.logFile, { flags: "a" });
    log = createLogger(level, fileStream);
  } else {
    log = createLogger(level, process.stderr);
  }
  logFile = config.logFile;
  return log;
}

export function getLogger(): bunyan {
  return log;
}

/** Flush and close any log file, falling back to stderr */
export async function closeLogger(): Promise<void> {
  configureLogger({ logLevel, logFile: "" });
  await Promise.all(closing.splice(0));
}
