import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

function isLevel(value: string): value is pino.Level {
  return ["fatal", "error", "warn", "info", "debug", "trace"].includes(value);
}

const STREAM_LEVEL: pino.Level = isLevel(LOG_LEVEL) ? LOG_LEVEL : "info";

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Create streams for both stdout and file
  const streams: pino.StreamEntry[] = [
    { level: STREAM_LEVEL, stream: process.stdout },
    {
      level: STREAM_LEVEL,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();
const options: LoggerOptions = { level: STREAM_LEVEL };

export const logger = destination !== undefined ? pino(options, destination) : pino(options);

// Child loggers per concern
export const sourceLogger = logger.child({ module: "source" });
export const sheetsLogger = logger.child({ module: "sheets" });
export const syncLogger = logger.child({ module: "sync" });
