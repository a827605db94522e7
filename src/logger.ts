import pino from "pino";

// stdout belongs to the MCP stdio transport; logs always go to stderr.
export const logger = pino(
  {
    name: "apt-sources",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  pino.destination(2),
);

export type { Logger } from "pino";
