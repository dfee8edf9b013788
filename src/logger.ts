import pino, { LoggerOptions } from "pino";

const options: LoggerOptions = {
  name: "research-bot",
  level: process.env.LOG_LEVEL ?? "info",
  redact: ["headers.authorization", 'headers["x-api-key"]'],
};

if (process.env.NODE_ENV === "development") {
  options.transport = { target: "pino-pretty" };
}

export const logger = pino(options);
