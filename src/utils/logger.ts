/**
 * Run logger. The console gets coloured levels; with LOG_DIR set, the same
 * lines go uncoloured to <LOG_DIR>/patch.log, replaced on every run.
 */
import path from "path";
import winston from "winston";

const { combine, colorize, errors, printf, timestamp } = winston.format;

export interface LogLine {
  level: string;
  message: unknown;
  timestamp?: unknown;
  module?: unknown;
  stack?: unknown;
}

/** `12:04:31 info: [builder] Creating package layout`, stack on the next lines */
export function formatLine({ level, message, timestamp: time, module: mod, stack }: LogLine): string {
  const tag = mod ? `[${mod}] ` : "";
  return stack ? `${time} ${level}: ${tag}${message}\n${stack}` : `${time} ${level}: ${tag}${message}`;
}

const line = printf(info => formatLine(info));

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(colorize(), line),
    silent: process.env.VITEST === "true",
  }),
];

if (process.env.LOG_DIR) {
  transports.push(new winston.transports.File({
    filename: path.join(process.env.LOG_DIR, "patch.log"),
    format: line,
    options: { flags: "w" },
  }));
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: combine(timestamp({ format: "HH:mm:ss" }), errors({ stack: true })),
  transports,
});

export default logger;
