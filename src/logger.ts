import pino from "pino";

// stdout belongs to whatever host embeds the engine; logs go to stderr.
export const logger = pino(
  {
    name: "arduino-cli-engine",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  pino.destination(2),
);
