import fs from "node:fs";
import path from "node:path";
import { createLogger, format, transports } from "winston";

// no config import here: the binding library loads this module
const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const LOG_DIR = process.env.LOG_DIR;

const { combine, timestamp, printf, colorize, uncolorize, errors } = format;
const logFormat = printf((info) => {
  const { level, message, timestamp, stack, ...meta } = info;

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, jsonReplacer)}` : "";

  return `${String(timestamp)} ${level}: ${String(
    stack ?? message,
  )}${metaStr}`;
});

// bound int64 values show up in metadata
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

const baseFormat = combine(
  timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  errors({ stack: true }),
  logFormat,
);

function fileTransports() {
  if (!LOG_DIR) return [];
  fs.mkdirSync(LOG_DIR, { recursive: true });
  return [
    new transports.File({
      filename: path.join(LOG_DIR, "error.log"),
      level: "error",
      format: combine(uncolorize(), baseFormat),
    }),
    new transports.File({
      filename: path.join(LOG_DIR, "combined.log"),
      format: combine(uncolorize(), baseFormat),
    }),
  ];
}

export const logger = createLogger({
  level: LOG_LEVEL,
  transports: [
    new transports.Console({
      format: combine(colorize(), baseFormat),
    }),
    ...fileTransports(),
  ],
  exitOnError: false,
});
