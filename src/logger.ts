import pino from "pino";
import { LOG_LEVEL } from "./config.js";

// stderr keeps stdout free for the result tables.
const logger: pino.Logger = pino(
  {
    level: LOG_LEVEL,
    formatters: {
      level(label: string) {
        return { level: label };
      }
    },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination(2)
);

export default logger;
